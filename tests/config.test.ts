/**
 * Configuration layering and validation.
 * Run with: npx tsx tests/config.test.ts
 */

import { applyEnv, mergeConfig, validateConfig, defaultConfig } from '../src/config.js';
import { section, test, assertEqual, assertJsonEqual, finish } from './helpers.js';

section('Environment overrides');

await test('empty environment keeps the defaults', () => {
  const cfg = applyEnv(defaultConfig, {});
  assertJsonEqual(cfg.server, { host: '0.0.0.0', port: 5000 });
  assertJsonEqual(cfg.kms, { bind_address: '0.0.0.0', port: '1688' });
  assertEqual(cfg.service.autostart, true);
  assertJsonEqual(cfg.service.args, ['pykms_Server.py', '0.0.0.0', '1688', '-V', 'INFO']);
});

await test('variables override their keys', () => {
  const cfg = applyEnv(defaultConfig, {
    PORT: '8080',
    SERVICE_ARGS: '  server.py   --debug ',
    SERVICE_AUTOSTART: 'off',
    KMS_IP: '10.0.0.1',
    DISPLAY_IP: '10.0.0.9',
    LOG_FILE: '/var/log/kms.txt'
  });
  assertEqual(cfg.server.port, 8080);
  assertJsonEqual(cfg.service.args, ['server.py', '--debug']);
  assertEqual(cfg.service.autostart, false);
  assertJsonEqual(cfg.kms, { bind_address: '10.0.0.1', port: '1688', display_address: '10.0.0.9' });
  assertEqual(cfg.paths.log_file, '/var/log/kms.txt');
  assertEqual(cfg.paths.product_db, './data/product-database.json');
});

await test('unparsable port falls back', () => {
  assertEqual(applyEnv(defaultConfig, { PORT: 'web' }).server.port, 5000);
});

await test('any other autostart value means on', () => {
  assertEqual(applyEnv(defaultConfig, { SERVICE_AUTOSTART: 'yes' }).service.autostart, true);
  assertEqual(applyEnv(defaultConfig, { SERVICE_AUTOSTART: 'FALSE' }).service.autostart, false);
});

section('config.json merge');

await test('file sections replace only the keys they set', () => {
  const cfg = mergeConfig(defaultConfig, {
    logs: { page_lines: 20, api_lines: 100, tail_max_bytes: 4096 }
  });
  assertEqual(cfg.logs.page_lines, 20);
  assertEqual(cfg.logs.tail_max_bytes, 4096);
  assertJsonEqual(cfg.service, defaultConfig.service);
  assertJsonEqual(cfg.web, { log_poll_interval_ms: 2000 });
});

section('Validation');

await test('defaults are valid', () => {
  assertJsonEqual(validateConfig(defaultConfig), { valid: true, errors: [] });
});

await test('problems are reported, not thrown', () => {
  const result = validateConfig({
    ...defaultConfig,
    server: { host: '0.0.0.0', port: 70000 },
    paths: { ...defaultConfig.paths, product_db: './no/such-db.json' }
  });
  assertJsonEqual(result, {
    valid: false,
    errors: [
      'Invalid web port: 70000',
      'Product database not found at: ./no/such-db.json'
    ]
  });
});

finish('Config');
