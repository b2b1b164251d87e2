import { ProbeError, ProbeErrorKind } from '../src/errors';
import { Logger, LogLevel, LogMetadata } from '../src/logging/logger';
import { ProbeTransport } from '../types/selector';

export const RPC_A = 'https://rpc-a.example.org';
export const RPC_B = 'https://rpc-b.example.org';
export const RPC_C = 'https://rpc-c.example.org';

/**
 * A number answers after that many ms, `hang` never answers,
 * any error kind rejects right away with that kind.
 */
export type Step = number | 'hang' | ProbeErrorKind;

// Each URL walks through its steps one call at a time and repeats the last one
export function scriptedTransport(script: Record<string, Step[]>) {
  const calls: Record<string, number> = {};
  const signals: AbortSignal[] = [];
  const transport: ProbeTransport = (url, signal) => {
    const n = calls[url] ?? 0;
    calls[url] = n + 1;
    signals.push(signal);
    const steps = script[url] ?? ['connection'];
    const step = steps[Math.min(n, steps.length - 1)];
    if (step === 'hang') return new Promise<void>(() => undefined);
    if (typeof step === 'string') return Promise.reject(new ProbeError(step, `${step} from ${url}`));
    return new Promise<void>((resolve) => setTimeout(resolve, step));
  };
  return { transport, calls, signals };
}

export type LogEntry = { level: LogLevel; message: string; meta?: LogMetadata };

export function captureLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return {
    entries,
    log(level, message, meta) {
      entries.push({ level, message, meta });
    },
  };
}

export function useFakeClock() {
  jest.useFakeTimers({ doNotFake: ['nextTick', 'queueMicrotask'] });
}
