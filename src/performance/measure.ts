import { setMaxListeners } from 'events';
import { ProbeOutcome, ProbeTransport, RoundResult } from '../../types/selector';
import { ProbeError } from '../errors';

export type MeasureOptions = {
  /** Hard limit for each probe (in milliseconds) */
  timeout: number;
  transport: ProbeTransport;
  clock: () => number;
  /** Aborting it abandons every probe still in flight */
  signal?: AbortSignal;
};

function toProbeError(err: unknown): ProbeError {
  if (err instanceof ProbeError) return err;
  return new ProbeError('connection', err instanceof Error ? err.message : String(err));
}

// Settles with the request, or rejects on timeout / abort, whichever comes first
function raceProbe(request: Promise<unknown>, timeout: number, controller: AbortController): Promise<void> {
  return new Promise((resolve, reject) => {
    const { signal } = controller;
    const onAbort = () => {
      clearTimeout(timer);
      reject(new ProbeError('cancelled', 'Probe cancelled'));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      reject(new ProbeError('timeout', `Probe timeout after ${timeout}ms`));
      controller.abort();
    }, timeout);
    signal.addEventListener('abort', onAbort, { once: true });

    request.then(
      () => {
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        resolve();
      },
      (err: unknown) => {
        clearTimeout(timer);
        signal.removeEventListener('abort', onAbort);
        reject(err);
      }
    );
  });
}

export async function probeProvider(url: string, index: number, opts: MeasureOptions): Promise<ProbeOutcome> {
  if (opts.signal?.aborted) {
    return { index, url, ok: false, kind: 'cancelled', message: 'Round cancelled before probing' };
  }

  const controller = new AbortController();
  const forwardAbort = () => controller.abort();
  opts.signal?.addEventListener('abort', forwardAbort, { once: true });

  const started = opts.clock();
  try {
    await raceProbe(opts.transport(url, controller.signal), opts.timeout, controller);
    return { index, url, ok: true, latencyMs: opts.clock() - started };
  } catch (err) {
    const failure = toProbeError(err);
    return { index, url, ok: false, kind: failure.kind, message: failure.message };
  } finally {
    opts.signal?.removeEventListener('abort', forwardAbort);
  }
}

/**
 * Probes every provider at once and resolves when each one has answered,
 * failed, timed out or been cancelled. Never rejects.
 */
export async function measureRound(urls: readonly string[], opts: MeasureOptions): Promise<RoundResult> {
  // every probe listens on the round signal
  if (opts.signal) setMaxListeners(urls.length + 1, opts.signal);
  return Promise.all(urls.map((url, index) => probeProvider(url, index, opts)));
}
