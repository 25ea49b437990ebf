/**
 * Best-effort address of this machine that a LAN client can reach.
 */

import { networkInterfaces } from 'os';
import type { NetworkInterfaceInfo } from 'os';

export const LOOPBACK_ADDRESS = '127.0.0.1';

export function detectDisplayAddress(
  interfaces: NodeJS.Dict<NetworkInterfaceInfo[]> = networkInterfaces()
): string {
  for (const name of Object.keys(interfaces)) {
    for (const net of interfaces[name] ?? []) {
      if (net.family === 'IPv4' && !net.internal) return net.address;
    }
  }
  return LOOPBACK_ADDRESS;
}
