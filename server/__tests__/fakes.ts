/**
 * In-process stand-ins shared by the engine suites: a scripted backend
 * transport and a scheduler that records delays instead of waiting.
 */

import { ProviderInvoker, ProviderRegistry, type ProviderCall, type ProviderTransport, type TransportReply } from '../ai/providers/index.js';
import type { Scheduler } from '../ai/retry.js';
import type { FinishReason, RawResponse } from '../ai/types.js';

type Step = TransportReply | Error | ((call: ProviderCall, signal?: AbortSignal) => Promise<TransportReply>);

export function reply(text: string, finishReason: FinishReason = 'stop'): TransportReply {
  return { text, finishReason };
}

export function raw(text: string, finishReason: FinishReason = 'stop'): RawResponse {
  return { text, finishReason, model: 'fake/small', provider: 'fake', latencyMs: 1 };
}

/**
 * Replays the given steps in order; the last step repeats once the
 * script runs out.
 */
export class ScriptedTransport implements ProviderTransport {
  readonly calls: ProviderCall[] = [];
  readonly signals: Array<AbortSignal | undefined> = [];

  constructor(
    private readonly steps: Step[],
    readonly family = 'fake'
  ) {}

  async generate(call: ProviderCall, signal?: AbortSignal): Promise<TransportReply> {
    this.calls.push(call);
    this.signals.push(signal);
    const step = this.steps[Math.min(this.calls.length - 1, this.steps.length - 1)];
    if (typeof step === 'function') return step(call, signal);
    if (step instanceof Error) throw step;
    return step;
  }
}

export class RecordingScheduler implements Scheduler {
  readonly delays: number[] = [];

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    this.delays.push(ms);
  }
}

/** Waits until the signal fires, then rejects with its reason. */
export function untilAborted(signal?: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (!signal) return;
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

export function fakeInvoker(transport: ProviderTransport): ProviderInvoker {
  const registry = new ProviderRegistry().register(`${transport.family}/`, transport).seal();
  return new ProviderInvoker(registry, { breakers: false });
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
