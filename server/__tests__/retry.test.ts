/**
 * Retry/Backoff Controller Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { RetryController, backoffDelay, configuredDelay, timerScheduler, type BackoffPolicy } from '../ai/retry.js';
import { ProviderError } from '../ai/types.js';
import { getMetrics, resetMetrics } from '../metrics.js';
import { RecordingScheduler } from './fakes.js';

const policy: BackoffPolicy = {
  baseDelayMs: 100,
  multiplier: 2,
  maxDelayMs: 10000,
  maxAttempts: 5,
  jitterRatio: 0.25,
};

const transient = () => new ProviderError('503 Service Unavailable', 'transient', 'fake', 503);
const permanent = () => new ProviderError('401 Unauthorized', 'permanent', 'fake', 401);

beforeEach(() => {
  resetMetrics();
});

describe('backoff delays', () => {
  it('grows exponentially up to the cap', () => {
    expect(configuredDelay(policy, 1)).toBe(100);
    expect(configuredDelay(policy, 2)).toBe(200);
    expect(configuredDelay(policy, 3)).toBe(400);
    expect(configuredDelay({ ...policy, maxDelayMs: 300 }, 3)).toBe(300);
  });

  it('only adds jitter, never subtracts', () => {
    expect(backoffDelay(policy, 1, () => 0)).toBe(100);
    expect(backoffDelay(policy, 1, () => 0.5)).toBe(112);
    expect(backoffDelay(policy, 2, () => 0.999)).toBe(249);
  });

  it('honours a larger retry-after hint', () => {
    expect(backoffDelay(policy, 1, () => 0, 5000)).toBe(5000);
    expect(backoffDelay(policy, 3, () => 0, 50)).toBe(400);
  });
});

describe('RetryController', () => {
  it('succeeds on the fourth attempt after three transient failures', async () => {
    const scheduler = new RecordingScheduler();
    const controller = new RetryController({ policy, scheduler, random: () => 0.5 });
    let calls = 0;

    const outcome = await controller.run(async (attempt) => {
      calls++;
      if (attempt <= 3) throw transient();
      return 'done';
    });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.value).toBe('done');
    expect(outcome.attempts).toBe(4);
    expect(calls).toBe(4);
    expect(scheduler.delays).toEqual([112, 225, 450]);
    expect(outcome.totalDelayMs).toBe(787);
    expect(outcome.totalDelayMs).toBeGreaterThanOrEqual(100 + 200 + 400);
    expect(outcome.transitions).toEqual([
      'idle',
      'attempting', 'backoff',
      'attempting', 'backoff',
      'attempting', 'backoff',
      'attempting', 'succeeded',
    ]);
    expect(getMetrics().retry.retries).toBe(3);
  });

  it('returns after exactly one attempt on a permanent error', async () => {
    const scheduler = new RecordingScheduler();
    const controller = new RetryController({ policy, scheduler });
    let calls = 0;

    const outcome = await controller.run(async () => {
      calls++;
      throw permanent();
    });

    expect(calls).toBe(1);
    expect(scheduler.delays).toEqual([]);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure).toEqual({ kind: 'permanent', message: '401 Unauthorized', attempts: 1, stage: 'generation' });
    expect(outcome.transitions).toEqual(['idle', 'attempting', 'failed']);
    expect(getMetrics().retry.permanent).toBe(1);
  });

  it('surfaces a transient failure once the attempt budget is spent', async () => {
    const scheduler = new RecordingScheduler();
    const controller = new RetryController({ policy: { ...policy, maxAttempts: 3 }, scheduler, random: () => 0 });

    const outcome = await controller.run(async () => {
      throw transient();
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure).toEqual({ kind: 'transient', message: '503 Service Unavailable', attempts: 3, stage: 'generation' });
    expect(scheduler.delays).toEqual([100, 200]);
    expect(outcome.transitions[outcome.transitions.length - 1]).toBe('exhausted');
    expect(getMetrics().retry.exhausted).toBe(1);
  });

  it('treats unclassified errors as transient', async () => {
    const controller = new RetryController({ policy: { ...policy, maxAttempts: 2 }, scheduler: new RecordingScheduler() });
    let calls = 0;

    const outcome = await controller.run(async () => {
      calls++;
      throw new Error('socket hang up');
    });

    expect(calls).toBe(2);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.kind).toBe('transient');
    expect(outcome.failure.message).toBe('socket hang up');
  });

  it('labels failures with the configured stage', async () => {
    const controller = new RetryController({ policy, scheduler: new RecordingScheduler(), stage: 'judge' });
    const outcome = await controller.run(async () => {
      throw permanent();
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.stage).toBe('judge');
  });

  it('stops waiting when the signal aborts during backoff', async () => {
    const abort = new AbortController();
    const controller = new RetryController({
      policy: { ...policy, baseDelayMs: 60000 },
      scheduler: timerScheduler,
      random: () => 0,
    });
    let calls = 0;

    setTimeout(() => abort.abort(), 10);
    const outcome = await controller.run(async () => {
      calls++;
      throw transient();
    }, abort.signal);

    expect(calls).toBe(1);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure).toEqual({
      kind: 'transient',
      message: 'Request aborted',
      attempts: 1,
      stage: 'generation',
      cancelled: true,
    });
    expect(outcome.transitions).toEqual(['idle', 'attempting', 'backoff']);
    expect(outcome.totalDelayMs).toBe(0);
    expect(getMetrics().retry.cancelled).toBe(1);
  });

  it('does not start when the signal is already aborted', async () => {
    const abort = new AbortController();
    abort.abort();
    let calls = 0;

    const outcome = await new RetryController({ policy }).run(async () => {
      calls++;
      return 'never';
    }, abort.signal);

    expect(calls).toBe(0);
    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.failure.cancelled).toBe(true);
    expect(outcome.failure.attempts).toBe(0);
  });
});
