/**
 * Catalog extraction: traversal, key priority, duplicate names, skipped subtrees.
 * Run with: npx tsx tests/catalog.test.ts
 */

import { classifyNode, extractCatalog, catalogToArray } from '../src/core/catalog.js';
import { generateCommands } from '../src/core/commands.js';
import type { CommandSet, ServerConfig } from '../src/types/index.js';
import { section, test, assertEqual, assertJsonEqual, assertNotNull, finish } from './helpers.js';

const keyOnly = (_name: string, key: string): CommandSet => ({
  install_key: key,
  set_server: '',
  activate: '',
  check_status: ''
});

section('Node classification');

await test('arrays are sequences', () => {
  const node = classifyNode([1, 2]);
  assertEqual(node.kind, 'sequence');
});

await test('KmsItems wins over SkuItems and product fields', () => {
  const node = classifyNode({ KmsItems: [], SkuItems: [], DisplayName: 'X', Gvlk: 'K' });
  assertJsonEqual(node, { kind: 'container', key: 'KmsItems', children: [] });
});

await test('SkuItems wins over product fields', () => {
  const node = classifyNode({ SkuItems: ['s'], DisplayName: 'X', Gvlk: 'K' });
  assertJsonEqual(node, { kind: 'container', key: 'SkuItems', children: ['s'] });
});

await test('Gvlk + DisplayName is a product', () => {
  const node = classifyNode({ DisplayName: 'Windows 10 Pro', Gvlk: 'TEST-KEY-1', Extra: true });
  assertJsonEqual(node, { kind: 'product', display_name: 'Windows 10 Pro', license_key: 'TEST-KEY-1' });
});

await test('empty or missing key is ignored', () => {
  assertEqual(classifyNode({ DisplayName: 'X', Gvlk: '' }).kind, 'ignored');
  assertEqual(classifyNode({ DisplayName: 'X' }).kind, 'ignored');
  assertEqual(classifyNode({ Gvlk: 'K' }).kind, 'ignored');
  assertEqual(classifyNode({ DisplayName: 'X', Gvlk: null }).kind, 'ignored');
});

await test('primitives and null are ignored', () => {
  assertEqual(classifyNode('text').kind, 'ignored');
  assertEqual(classifyNode(42).kind, 'ignored');
  assertEqual(classifyNode(null).kind, 'ignored');
  assertEqual(classifyNode(undefined).kind, 'ignored');
});

await test('non-string display names are stringified', () => {
  assertJsonEqual(classifyNode({ DisplayName: 7, Gvlk: 'K' }), { kind: 'product', display_name: '7', license_key: 'K' });
});

section('Extraction');

await test('N distinct leaves give N entries', () => {
  const db = [
    {
      Name: 'Group A',
      KmsItems: [
        { SkuItems: [{ DisplayName: 'A1', Gvlk: 'KA1' }, { DisplayName: 'A2', Gvlk: 'KA2' }] },
        { SkuItems: [{ DisplayName: 'A3', Gvlk: 'KA3' }] }
      ]
    },
    { KmsItems: [{ SkuItems: [{ DisplayName: 'B1', Gvlk: 'KB1' }] }] }
  ];
  const catalog = extractCatalog(db, keyOnly);
  assertEqual(catalog.size, 4);
  assertJsonEqual(Array.from(catalog.keys()), ['A1', 'A2', 'A3', 'B1']);
  assertEqual(catalog.get('A2')?.license_key, 'KA2');
});

await test('duplicate display name keeps the last visited entry', () => {
  const db = [
    { DisplayName: 'Dup', Gvlk: 'FIRST' },
    { DisplayName: 'Other', Gvlk: 'OTHER' },
    { KmsItems: [{ DisplayName: 'Dup', Gvlk: 'LAST' }] }
  ];
  const catalog = extractCatalog(db, keyOnly);
  assertEqual(catalog.size, 2);
  const dup = catalog.get('Dup');
  assertNotNull(dup);
  assertEqual(dup.license_key, 'LAST');
  assertEqual(dup.commands.install_key, 'LAST');
  // Overwrite keeps the first insertion position
  assertJsonEqual(Array.from(catalog.keys()), ['Dup', 'Other']);
});

await test('node with items key is not emitted as a product', () => {
  const db = { DisplayName: 'Outer', Gvlk: 'K-OUT', SkuItems: [{ DisplayName: 'Inner', Gvlk: 'K-IN' }] };
  const catalog = extractCatalog(db, keyOnly);
  assertJsonEqual(Array.from(catalog.keys()), ['Inner']);
});

await test('KmsItems subtree is followed and SkuItems sibling is not', () => {
  const db = {
    KmsItems: [{ DisplayName: 'From Kms', Gvlk: 'K1' }],
    SkuItems: [{ DisplayName: 'From Sku', Gvlk: 'K2' }]
  };
  const catalog = extractCatalog(db, keyOnly);
  assertJsonEqual(Array.from(catalog.keys()), ['From Kms']);
});

await test('empty keys and unknown shapes are skipped', () => {
  const db = [
    { DisplayName: 'No Key', Gvlk: '' },
    'stray string',
    null,
    { Unrelated: true },
    { DisplayName: 'Real', Gvlk: 'K' }
  ];
  const catalog = extractCatalog(db, keyOnly);
  assertJsonEqual(Array.from(catalog.keys()), ['Real']);
});

await test('arbitrary nesting depth is walked', () => {
  let node: unknown = { DisplayName: 'Deep', Gvlk: 'K-DEEP' };
  for (let i = 0; i < 50; i++) {
    node = i % 2 === 0 ? [node] : { SkuItems: node };
  }
  const catalog = extractCatalog(node, keyOnly);
  assertEqual(catalog.get('Deep')?.license_key, 'K-DEEP');
});

await test('a throwing subtree is skipped and siblings are kept', () => {
  const broken = { DisplayName: 'Broken' };
  Object.defineProperty(broken, 'Gvlk', {
    enumerable: true,
    get() {
      throw new Error('corrupt record');
    }
  });
  const db = [
    { DisplayName: 'Before', Gvlk: 'K1' },
    { KmsItems: [broken, { DisplayName: 'Sibling', Gvlk: 'K2' }] },
    { DisplayName: 'After', Gvlk: 'K3' }
  ];
  const catalog = extractCatalog(db, keyOnly);
  assertJsonEqual(Array.from(catalog.keys()), ['Before', 'Sibling', 'After']);
});

await test('non-container roots give an empty catalog', () => {
  assertEqual(extractCatalog(null, keyOnly).size, 0);
  assertEqual(extractCatalog('text', keyOnly).size, 0);
  assertEqual(extractCatalog({}, keyOnly).size, 0);
});

await test('entries carry generated commands', () => {
  const config: ServerConfig = {
    bind_address: '0.0.0.0',
    port: '1688',
    status: 'running',
    display_address: '10.0.0.5'
  };
  const catalog = extractCatalog(
    [{ DisplayName: 'Windows 10 Pro', Gvlk: 'TEST-KEY-PRO' }],
    (name, key) => generateCommands(name, key, config)
  );
  assertJsonEqual(catalogToArray(catalog), [{
    display_name: 'Windows 10 Pro',
    license_key: 'TEST-KEY-PRO',
    commands: {
      install_key: 'slmgr /ipk TEST-KEY-PRO',
      set_server: 'slmgr /skms 10.0.0.5:1688',
      activate: 'slmgr /ato',
      check_status: 'slmgr /xpr'
    }
  }]);
});

finish('Catalog');
