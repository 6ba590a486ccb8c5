/**
 * Bounded, cancellable probe pool with priority-ordered winner selection.
 *
 * Probes run in a sliding window (each settled probe frees a slot for the
 * next one). The winner is the lowest-index hit whose higher-priority probes
 * have all missed; completion order never decides. When the deadline or the
 * caller's signal fires first, the best hit settled so far wins. Either way
 * the remaining probes are cancelled through the shared AbortSignal.
 */
import { logger } from '../logger.js';

export const MAX_PROBE_CONCURRENCY = 10;

export interface Probe<T> {
  label: string;
  run(signal: AbortSignal): Promise<T | null>;
}

export interface ProbePoolOptions {
  concurrency?: number;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface ProbeHit<T> {
  index: number;
  label: string;
  value: T;
}

export interface ProbeOutcome<T> {
  winner: ProbeHit<T> | null;
  timedOut: boolean;
  aborted: boolean;
  /** Probes that finished before the decision */
  settled: number;
}

type ProbeState<T> = { status: 'pending' } | { status: 'miss' } | { status: 'hit'; value: T };

type StopResult = { kind: 'stop'; reason: 'deadline' | 'abort' };

type RaceResult<T> = { kind: 'settled'; id: number; value: T | null } | StopResult;

/** Resolves when the deadline passes or the caller aborts, whichever is first. */
function stopCondition(
  timeoutMs: number,
  signal?: AbortSignal
): { promise: Promise<StopResult>; dispose: () => void } {
  const cleanup: Array<() => void> = [];
  const promise = new Promise<StopResult>((resolve) => {
    const timer = setTimeout(() => resolve({ kind: 'stop', reason: 'deadline' }), timeoutMs);
    cleanup.push(() => clearTimeout(timer));
    if (!signal) return;
    if (signal.aborted) {
      resolve({ kind: 'stop', reason: 'abort' });
      return;
    }
    const onAbort = (): void => resolve({ kind: 'stop', reason: 'abort' });
    signal.addEventListener('abort', onAbort, { once: true });
    cleanup.push(() => signal.removeEventListener('abort', onAbort));
  });
  return { promise, dispose: () => cleanup.forEach((fn) => fn()) };
}

/**
 * Merge step over probe states in priority order.
 * Returns undefined while a higher-priority probe is still pending.
 */
function decide<T>(
  probes: readonly Probe<T>[],
  states: readonly ProbeState<T>[]
): ProbeHit<T> | null | undefined {
  for (let index = 0; index < states.length; index++) {
    const state = states[index];
    if (state.status === 'pending') return undefined;
    if (state.status === 'hit') return { index, label: probes[index].label, value: state.value };
  }
  return null;
}

function bestSettled<T>(
  probes: readonly Probe<T>[],
  states: readonly ProbeState<T>[]
): ProbeHit<T> | null {
  for (let index = 0; index < states.length; index++) {
    const state = states[index];
    if (state.status === 'hit') return { index, label: probes[index].label, value: state.value };
  }
  return null;
}

export async function runPriorityProbes<T>(
  probes: readonly Probe<T>[],
  options: ProbePoolOptions
): Promise<ProbeOutcome<T>> {
  const concurrency = Math.max(
    1,
    Math.min(options.concurrency ?? MAX_PROBE_CONCURRENCY, MAX_PROBE_CONCURRENCY, probes.length)
  );
  const controller = new AbortController();
  const states: ProbeState<T>[] = probes.map((): ProbeState<T> => ({ status: 'pending' }));

  const stop = stopCondition(options.timeoutMs, options.signal);

  let nextId = 0;
  const inflight = new Map<number, Promise<RaceResult<T>>>();

  function enqueue(): void {
    while (inflight.size < concurrency && nextId < probes.length) {
      const id = nextId++;
      const probe = probes[id];

      const promise = (async (): Promise<RaceResult<T>> => {
        try {
          return { kind: 'settled', id, value: await probe.run(controller.signal) };
        } catch (e) {
          logger.debug({ probe: probe.label, error: String(e) }, 'Probe failed, counting as miss');
          return { kind: 'settled', id, value: null };
        }
      })();

      inflight.set(id, promise);
    }
  }

  let stopReason: 'deadline' | 'abort' | null = null;
  enqueue();
  let decision = decide(probes, states);

  while (decision === undefined) {
    const result = await Promise.race([...inflight.values(), stop.promise]);
    if (result.kind === 'stop') {
      stopReason = result.reason;
      break;
    }

    inflight.delete(result.id);
    states[result.id] =
      result.value === null ? { status: 'miss' } : { status: 'hit', value: result.value };
    enqueue();
    decision = decide(probes, states);
  }

  controller.abort();
  stop.dispose();

  const winner = stopReason === null ? (decision ?? null) : bestSettled(probes, states);
  return {
    winner,
    timedOut: stopReason === 'deadline',
    aborted: stopReason === 'abort',
    settled: states.filter((s) => s.status !== 'pending').length,
  };
}
