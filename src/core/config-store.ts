/**
 * Config Store
 * Owns the advertised KMS server address and status.
 *
 * Readers only ever see frozen snapshots; a write replaces the whole snapshot.
 * Writes share the log sink's write lock, so concurrent updates apply one at a
 * time and each one's audit line is written before the next update starts.
 */

import { logger } from '../utils/logger.js';
import { IOError } from './errors.js';
import type { LogSink } from './log-sink.js';
import type { ServerConfig, ServerConfigPayload, ServerStatus } from '../types/index.js';

export class ConfigStore {
  private snapshot: Readonly<ServerConfig>;

  constructor(
    private readonly sink: LogSink,
    initial: ServerConfig
  ) {
    this.snapshot = Object.freeze({ ...initial });
  }

  get(): Readonly<ServerConfig> {
    return this.snapshot;
  }

  /**
   * Replace address and port together. Status and display address are kept.
   * An audit failure is logged; the new config still stands.
   */
  set(bindAddress: string, port: string): Promise<Readonly<ServerConfig>> {
    return this.sink.exclusive(async (write) => {
      const next = Object.freeze({ ...this.snapshot, bind_address: bindAddress, port });
      this.snapshot = next;

      try {
        await write(`Server configuration changed to ${bindAddress}:${port}`);
      } catch (error) {
        const message = error instanceof IOError ? error.message : String(error);
        logger.error('Failed to write config audit line', { error: message });
      }
      logger.audit.configChanged(bindAddress, port);

      return next;
    });
  }

  setStatus(status: ServerStatus): Readonly<ServerConfig> {
    if (this.snapshot.status !== status) {
      this.snapshot = Object.freeze({ ...this.snapshot, status });
      logger.debug('Server status changed', { status });
    }
    return this.snapshot;
  }
}

export function toPayload(config: ServerConfig): ServerConfigPayload {
  return {
    ip: config.bind_address,
    port: config.port,
    status: config.status,
    display_ip: config.display_address
  };
}
