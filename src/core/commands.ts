/**
 * Command Generator
 * The four slmgr commands a Windows client runs to activate against this server.
 */

import type { CommandSet, ServerConfig } from '../types/index.js';

export const WILDCARD_ADDRESS = '0.0.0.0';

/**
 * Address a client should dial. A wildcard bind is not dialable,
 * so the display address stands in for it.
 */
export function resolveServerAddress(config: ServerConfig): string {
  const host = config.bind_address === WILDCARD_ADDRESS ? config.display_address : config.bind_address;
  return `${host}:${config.port}`;
}

export function generateCommands(_displayName: string, licenseKey: string, config: ServerConfig): CommandSet {
  const serverAddress = resolveServerAddress(config);

  return {
    install_key: `slmgr /ipk ${licenseKey}`,
    set_server: `slmgr /skms ${serverAddress}`,
    activate: 'slmgr /ato',
    check_status: 'slmgr /xpr'
  };
}
