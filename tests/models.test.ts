#!/usr/bin/env tsx
/**
 * POLICY POOL - Model Tests
 *
 * Validates:
 *   - LinearPolicy forward pass (action, log-probability, value)
 *   - Recurrent state update and reset on done
 *   - Snapshot save/load, clone independence
 *   - Architecture registry
 *
 * Run: npx tsx tests/models.test.ts
 */

import { writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { ZodError } from 'zod';
import {
  ArchitectureRegistry,
  LINEAR_ARCHITECTURE,
  LinearPolicy,
  createDefaultRegistry,
  type LinearSnapshot,
} from '../src/models';
import { mulberry32 } from '../src/pool';
import { assert, assertApprox, assertEqual, assertThrows, finish, section, tempDir } from './harness';

function feedForwardSnapshot(): LinearSnapshot {
  return {
    architecture: LINEAR_ARCHITECTURE,
    version: 1,
    observationSize: 2,
    actionSize: 2,
    hiddenSize: 0,
    policyWeights: [[1, 0], [0, 1]],
    policyBias: [0, 0],
    valueWeights: [1, 1],
    valueBias: 0.5,
    recurrentWeights: [],
  };
}

function recurrentSnapshot(): LinearSnapshot {
  return {
    architecture: LINEAR_ARCHITECTURE,
    version: 1,
    observationSize: 1,
    actionSize: 2,
    hiddenSize: 1,
    policyWeights: [[1, 0], [0, 1]],
    policyBias: [0, 0],
    valueWeights: [0, 0],
    valueBias: 0,
    recurrentWeights: [[1]],
  };
}

function policyFrom(snapshot: LinearSnapshot): LinearPolicy {
  const policy = new LinearPolicy();
  policy.fromJSON(snapshot);
  return policy;
}

function testForward(): void {
  section('LinearPolicy: Forward Pass');

  const policy = policyFrom(feedForwardSnapshot());
  const result = policy.act([[3, 1], [0, 2]]);

  assertEqual(result.action, [[0], [1]], 'greedy action is the arg-max logit');
  assertApprox(result.logProbability[0], -0.126928, 1e-6, 'log-probability from softmax');
  assertApprox(result.value[0], 4.5, 1e-12, 'value = w . obs + bias');
  assertApprox(result.value[1], 2.5, 1e-12, 'value for second sample');
  assert(result.state === undefined, 'no state returned when none supplied');
}

function testRecurrent(): void {
  section('LinearPolicy: Recurrent State');

  const policy = policyFrom(recurrentSnapshot());

  const first = policy.act([[1]], [[[0]]]);
  const h1 = first.state?.[0][0][0] ?? NaN;
  assertApprox(h1, 0.761594, 1e-6, 'h = tanh(U obs) from zero state');

  const carried = policy.act([[1]], [[[h1]]], [false]);
  assertApprox(carried.state?.[0][0][0] ?? NaN, 0.881130, 1e-6, 'previous hidden state decays into the next');

  const reset = policy.act([[1]], [[[h1]]], [true]);
  assertApprox(reset.state?.[0][0][0] ?? NaN, 0.761594, 1e-6, 'done resets the hidden state');

  const extra = policy.act([[1]], [[[0]], [[7, 8]]]);
  assertEqual(extra.state?.[1], [[7, 8]], 'extra state components pass through');
}

function testErrors(): void {
  section('LinearPolicy: Errors');

  assertThrows(() => new LinearPolicy().act([[1]]), Error, 'empty policy cannot act');
  assertThrows(
    () => policyFrom(feedForwardSnapshot()).act([[1, 2, 3]]),
    Error,
    'wrong observation size rejected',
  );
}

function testSaveLoad(): void {
  section('LinearPolicy: Snapshots');

  const dir = tempDir();
  const path = join(dir, 'nested', 'policy.json');

  const original = new LinearPolicy({ observationSize: 4, actionSize: 3, hiddenSize: 2 }, 7);
  original.save(path);

  const restored = new LinearPolicy();
  restored.load(path);
  assertEqual(restored.toJSON(), original.toJSON(), 'load restores saved parameters');

  const obs = [[0.1, -0.2, 0.3, 0.4]];
  const state = [[[0, 0]]];
  assertEqual(restored.act(obs, state), original.act(obs, state), 'restored policy acts identically');

  const bad = join(dir, 'bad.json');
  writeFileSync(bad, JSON.stringify({ ...feedForwardSnapshot(), policyWeights: [[1, 0]] }), 'utf-8');
  assertThrows(() => new LinearPolicy().load(bad), ZodError, 'snapshot with mismatched shape rejected');
}

function testClone(): void {
  section('LinearPolicy: Clone');

  const original = new LinearPolicy({ observationSize: 3, actionSize: 2 }, 11);
  const before = original.toJSON();
  const copy = original.clone();

  assertEqual(copy.toJSON(), before, 'clone starts equal');
  copy.perturb(0.5, mulberry32(3));
  assertEqual(original.toJSON(), before, 'perturbing the clone leaves the original untouched');
  assert(JSON.stringify(copy.toJSON()) !== JSON.stringify(before), 'clone parameters changed');

  const seededA = new LinearPolicy({ observationSize: 3, actionSize: 2 }, 5).toJSON();
  const seededB = new LinearPolicy({ observationSize: 3, actionSize: 2 }, 5).toJSON();
  assertEqual(seededA, seededB, 'same seed gives the same initial parameters');
}

function testRegistry(): void {
  section('Architecture Registry');

  const registry = createDefaultRegistry();
  assertEqual(registry.tags(), [LINEAR_ARCHITECTURE], 'default registry knows the linear policy');
  assert(registry.create('unknown') === null, 'unknown tag yields null');

  const model = registry.create(LINEAR_ARCHITECTURE);
  assert(model instanceof LinearPolicy, 'linear tag allocates a LinearPolicy');

  assertThrows(
    () => registry.register(LINEAR_ARCHITECTURE, () => new LinearPolicy()),
    Error,
    'duplicate registration rejected',
  );

  const custom = new ArchitectureRegistry();
  assert(!custom.has(LINEAR_ARCHITECTURE), 'new registry starts empty');
}

function runAllTests(): void {
  console.log('POLICY POOL - Model Tests');
  console.log('=========================');

  testForward();
  testRecurrent();
  testErrors();
  testSaveLoad();
  testClone();
  testRegistry();

  finish('Models');
}

runAllTests();
