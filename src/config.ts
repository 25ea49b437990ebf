/**
 * Configuration Loader
 * Loads config from .env and config.json with sensible defaults
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { config as dotenvConfig } from 'dotenv';
import type { Config } from './types/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
// src/ under tsx, dist/src/ once built
const ROOT_DIR = existsSync(resolve(__dirname, '..', 'package.json'))
  ? resolve(__dirname, '..')
  : resolve(__dirname, '..', '..');

// Load .env file
dotenvConfig({ path: resolve(ROOT_DIR, '.env') });

type Env = Record<string, string | undefined>;

// Default configuration
export const defaultConfig: Config = {
  server: {
    host: '0.0.0.0',
    port: 5000
  },
  service: {
    command: 'python3',
    args: ['pykms_Server.py', '0.0.0.0', '1688', '-V', 'INFO'],
    cwd: './py-kms',
    autostart: true,
    startup_grace_ms: 2000,
    stop_timeout_ms: 5000
  },
  kms: {
    bind_address: '0.0.0.0',
    port: '1688'
  },
  paths: {
    log_file: './kms_logs.txt',
    product_db: './data/product-database.json'
  },
  logs: {
    page_lines: 50,
    api_lines: 100,
    tail_max_bytes: 1024 * 1024
  },
  web: {
    log_poll_interval_ms: 2000
  }
};

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  return !/^(false|0|no|off)$/i.test(value.trim());
}

function parsePort(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

/**
 * Environment variables win over config.json, which wins over defaults
 */
export function applyEnv(base: Config, env: Env): Config {
  return {
    ...base,
    server: {
      host: env.HOST || base.server.host,
      port: parsePort(env.PORT, base.server.port)
    },
    service: {
      ...base.service,
      command: env.SERVICE_COMMAND || base.service.command,
      args: env.SERVICE_ARGS ? env.SERVICE_ARGS.split(/\s+/).filter(Boolean) : base.service.args,
      cwd: env.SERVICE_CWD || base.service.cwd,
      autostart: parseBoolean(env.SERVICE_AUTOSTART, base.service.autostart)
    },
    kms: {
      bind_address: env.KMS_IP || base.kms.bind_address,
      port: env.KMS_PORT || base.kms.port,
      display_address: env.DISPLAY_IP || base.kms.display_address
    },
    paths: {
      log_file: env.LOG_FILE || base.paths.log_file,
      product_db: env.PRODUCT_DB_PATH || base.paths.product_db
    }
  };
}

/**
 * Merge a parsed config.json over the defaults, section by section
 */
export function mergeConfig(base: Config, fileConfig: Partial<Config>): Config {
  return {
    server: { ...base.server, ...fileConfig.server },
    service: { ...base.service, ...fileConfig.service },
    kms: { ...base.kms, ...fileConfig.kms },
    paths: { ...base.paths, ...fileConfig.paths },
    logs: { ...base.logs, ...fileConfig.logs },
    web: { ...base.web, ...fileConfig.web }
  };
}

/**
 * Load configuration from config.json, merging with defaults
 */
function loadConfig(): Config {
  const configPath = resolve(ROOT_DIR, 'config.json');

  if (!existsSync(configPath)) {
    return applyEnv(defaultConfig, process.env);
  }

  try {
    const fileContent = readFileSync(configPath, 'utf-8');
    const fileConfig: Partial<Config> = JSON.parse(fileContent);
    return applyEnv(mergeConfig(defaultConfig, fileConfig), process.env);
  } catch (error) {
    console.error('[config] Error loading config.json:', error);
    return applyEnv(defaultConfig, process.env);
  }
}

// Export singleton config
export const config = loadConfig();

/** Resolve a configured path against the project root */
export function resolvePath(path: string): string {
  return resolve(ROOT_DIR, path);
}

// Problems worth a warning; none of them stop the dashboard
export function validateConfig(cfg: Config = config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!Number.isInteger(cfg.server.port) || cfg.server.port < 0 || cfg.server.port > 65535) {
    errors.push(`Invalid web port: ${cfg.server.port}`);
  }

  if (!existsSync(resolvePath(cfg.paths.product_db))) {
    errors.push(`Product database not found at: ${cfg.paths.product_db}`);
  }

  if (cfg.service.autostart && !cfg.service.command) {
    errors.push('SERVICE_COMMAND is empty but autostart is enabled');
  }

  return {
    valid: errors.length === 0,
    errors
  };
}
