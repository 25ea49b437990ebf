/**
 * Shared test harness.
 * Each suite is a plain script: run with `npx tsx tests/<suite>.test.ts`.
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

let passed = 0;
let failed = 0;
const errors: string[] = [];
const tempDirs: string[] = [];

export function section(title: string): void {
  console.log(`\n📋 ${title}\n`);
}

export async function test(name: string, fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (error) {
    failed++;
    const msg = error instanceof Error ? error.message : String(error);
    errors.push(`${name}: ${msg}`);
    console.log(`  ✗ ${name}`);
    console.log(`    Error: ${msg}`);
  }
}

export function assertEqual<T>(actual: T, expected: T, message?: string): void {
  if (actual !== expected) {
    throw new Error(message || `Expected ${JSON.stringify(expected)}, got ${JSON.stringify(actual)}`);
  }
}

/** Structural comparison through JSON; key order matters */
export function assertJsonEqual(actual: unknown, expected: unknown, message?: string): void {
  const a = JSON.stringify(actual);
  const e = JSON.stringify(expected);
  if (a !== e) {
    throw new Error(message || `Expected ${e}, got ${a}`);
  }
}

export function assertTrue(actual: boolean, message?: string): void {
  if (!actual) {
    throw new Error(message || 'Expected true, got false');
  }
}

export function assertNotNull<T>(actual: T | null | undefined, message?: string): asserts actual is T {
  if (actual === null || actual === undefined) {
    throw new Error(message || 'Expected non-null value');
  }
}

export async function assertRejects(promise: Promise<unknown>, check: (error: unknown) => void): Promise<void> {
  try {
    await promise;
  } catch (error) {
    check(error);
    return;
  }
  throw new Error('Expected promise to reject');
}

export function makeTempDir(prefix: string): string {
  const dir = mkdtempSync(join(tmpdir(), `kms-console-${prefix}-`));
  tempDirs.push(dir);
  return dir;
}

export async function waitFor(check: () => boolean | Promise<boolean>, timeoutMs = 5000, label = 'condition'): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (await check()) return;
    await new Promise(resolve => setTimeout(resolve, 25));
  }
  throw new Error(`Timed out waiting for ${label}`);
}

export function numberedLines(prefix: string, count: number): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}-${String(i + 1).padStart(3, '0')}`);
}

export function finish(suite: string): never {
  for (const dir of tempDirs) {
    rmSync(dir, { recursive: true, force: true });
  }

  console.log('\n' + '='.repeat(50));
  console.log(`\n📊 ${suite}: ${passed} passed, ${failed} failed\n`);

  if (failed > 0) {
    console.log('❌ Failed tests:');
    errors.forEach(e => console.log(`  - ${e}`));
    process.exit(1);
  }
  console.log('✅ All tests passed!');
  process.exit(0);
}
