/**
 * POLICY POOL - Test Utilities
 *
 * Minimal pass/fail harness shared by the tsx test scripts. Each script
 * runs its cases and ends with `finish()`, which exits non-zero when any
 * assertion failed.
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

let passed = 0;
let failed = 0;
const failures: string[] = [];
const tempDirs: string[] = [];

export function assert(condition: boolean, message: string): void {
  if (!condition) {
    failed++;
    failures.push(message);
    console.log(`  FAIL: ${message}`);
  } else {
    passed++;
    console.log(`  PASS: ${message}`);
  }
}

export function assertApprox(actual: number, expected: number, tolerance: number, message: string): void {
  assert(
    Math.abs(actual - expected) <= tolerance,
    `${message} (actual: ${actual}, expected: ${expected}, tolerance: ${tolerance})`,
  );
}

export function assertEqual<T>(actual: T, expected: T, message: string): void {
  const a = JSON.stringify(actual);
  const e = JSON.stringify(expected);
  assert(a === e, a === e ? message : `${message} (actual: ${a}, expected: ${e})`);
}

/** Assert that `fn` throws an instance of `errorClass`; returns the error. */
export function assertThrows<E extends Error>(
  fn: () => unknown,
  errorClass: abstract new (...args: never[]) => E,
  message: string,
): E | null {
  try {
    fn();
  } catch (err) {
    if (err instanceof errorClass) {
      assert(true, message);
      return err;
    }
    assert(false, `${message} (threw ${String(err)})`);
    return null;
  }
  assert(false, `${message} (did not throw)`);
  return null;
}

export function section(name: string): void {
  console.log(`\n--- ${name} ---`);
}

/** Fresh temp directory, removed by `finish()`. */
export function tempDir(): string {
  const dir = mkdtempSync(join(tmpdir(), 'policy-pool-test-'));
  tempDirs.push(dir);
  return dir;
}

export function finish(suite: string): void {
  for (const dir of tempDirs) rmSync(dir, { recursive: true, force: true });

  console.log('\n=========================');
  console.log(`${suite}: ${passed} passed, ${failed} failed`);

  if (failures.length > 0) {
    console.log('\nFAILURES:');
    for (const f of failures) {
      console.log(`  - ${f}`);
    }
    process.exit(1);
  } else {
    console.log('All tests passed!');
  }
}
