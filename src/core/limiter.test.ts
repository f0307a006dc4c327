import assert from 'node:assert/strict';
import test from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';
import { createLimiter } from './limiter.js';

test('createLimiter never exceeds its slot count', async () => {
  const limit = createLimiter(2);
  let active = 0;
  let peak = 0;

  const results = await Promise.all([30, 10, 20, 5, 15].map((ms, i) =>
    limit(async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(ms);
      active--;
      return i;
    })
  ));

  assert.equal(peak, 2);
  assert.deepEqual(results, [0, 1, 2, 3, 4]);
});

test('createLimiter releases the slot of a failing task', async () => {
  const limit = createLimiter(1);

  await assert.rejects(limit(() => { throw new Error('boom'); }), /boom/);
  assert.equal(await limit(async () => 'next'), 'next');
});

test('createLimiter treats a slot count below one as one', async () => {
  const limit = createLimiter(0);
  let active = 0;
  let peak = 0;

  await Promise.all([1, 2, 3].map(() => limit(async () => {
    active++;
    peak = Math.max(peak, active);
    await delay(1);
    active--;
  })));

  assert.equal(peak, 1);
});

test('createLimiter runs one task at a time for a non-finite slot count', async () => {
  for (const slots of [Number('abc'), Infinity]) {
    const limit = createLimiter(slots);
    let active = 0;
    let peak = 0;

    const results = await Promise.all([1, 2, 3].map(n => limit(async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(1);
      active--;
      return n;
    })));

    assert.deepEqual(results, [1, 2, 3]);
    assert.equal(peak, 1);
  }
});
