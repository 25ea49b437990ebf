/**
 * KMS Console - Type Definitions
 */

// ============================================================================
// Server Config
// ============================================================================

export type ServerStatus = 'running' | 'stopped' | 'unknown';

export interface ServerConfig {
  bind_address: string;
  port: string;
  status: ServerStatus;
  display_address: string;  // best-effort address a client can dial
}

/** Shape of ServerConfig on the HTTP API */
export interface ServerConfigPayload {
  ip: string;
  port: string;
  status: ServerStatus;
  display_ip: string;
}

// ============================================================================
// Product Catalog
// ============================================================================

export interface CommandSet {
  install_key: string;
  set_server: string;
  activate: string;
  check_status: string;
}

export interface ProductCatalogEntry {
  display_name: string;
  license_key: string;
  commands: CommandSet;
}

/** Insertion-ordered, keyed by display name */
export type Catalog = Map<string, ProductCatalogEntry>;

/**
 * One node of the product database, classified by shape.
 * 'container' covers both the KmsItems and SkuItems levels.
 */
export type DatabaseNode =
  | { kind: 'sequence'; items: readonly unknown[] }
  | { kind: 'container'; key: 'KmsItems' | 'SkuItems'; children: unknown }
  | { kind: 'product'; display_name: string; license_key: string }
  | { kind: 'ignored' };

export type CommandGenerator = (displayName: string, licenseKey: string) => CommandSet;

// ============================================================================
// Process Supervision
// ============================================================================

export type SupervisorState = 'not_started' | 'running' | 'stopped' | 'crashed';

export interface ServiceLaunchOptions {
  command: string;
  args: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ProcessHandle {
  pid: number;
  command: string;
  args: string[];
  started_at: Date;
}

export interface SupervisorStatus {
  state: SupervisorState;
  pid: number | null;
  command: string | null;
  args: string[];
  started_at: string | null;
  exited_at: string | null;
  exit_code: number | null;
  signal: string | null;
}

// ============================================================================
// Dashboard
// ============================================================================

export interface DashboardView {
  config: ServerConfig;
  catalog: Catalog;
  logs: string[];
}

export interface ExecuteCommandResult {
  success: true;
  command: string;
  result: string;
  product: string;
}

// ============================================================================
// Configuration
// ============================================================================

export interface Config {
  server: {
    host: string;
    port: number;
  };
  service: {
    command: string;
    args: string[];
    cwd: string;
    autostart: boolean;
    startup_grace_ms: number;
    stop_timeout_ms: number;
  };
  kms: {
    bind_address: string;
    port: string;
    display_address?: string;
  };
  paths: {
    log_file: string;
    product_db: string;
  };
  logs: {
    page_lines: number;
    api_lines: number;
    tail_max_bytes: number;
  };
  web: {
    log_poll_interval_ms: number;
  };
}

// ============================================================================
// Logging
// ============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
}
