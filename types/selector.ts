import type { ProbeErrorKind } from '../src/errors';
import type { LogLevel, Logger } from '../src/logging/logger';

export type JsonRpcPayload = {
  jsonrpc: '2.0';
  method: string;
  params: unknown[];
  id: number;
};

/**
 * Sends one probe request to `url`. Resolving means the provider answered
 * successfully; rejecting (ideally with a `ProbeError`) means it did not.
 *
 * The signal is aborted when the probe times out or the selector is destroyed.
 */
export type ProbeTransport = (url: string, signal: AbortSignal) => Promise<unknown>;

export type ProviderRecord = {
  url: string;
  /** Round-trip time of the last probe in milliseconds, unset if it failed */
  lastLatency?: number;
  lastError?: ProbeErrorKind;
  consecutiveFailures: number;
};

export type ProbeSuccess = { index: number; url: string; ok: true; latencyMs: number };
export type ProbeFailure = { index: number; url: string; ok: false; kind: ProbeErrorKind; message: string };
export type ProbeOutcome = ProbeSuccess | ProbeFailure;

/** Outcomes of one round, ordered by provider index. */
export type RoundResult = readonly ProbeOutcome[];

export type SelectionSnapshot = {
  readonly fastestUrl?: string;
  readonly latencyMs?: number;
  /** Bumped once for every round that had at least one successful probe */
  readonly generation: number;
};

/**
 * Configuration options for the FastestRpcSelector.
 *
 * - `settings.probeTimeoutRatio` - Fraction of the interval a single probe may take.
 * - `settings.logLevel` - Minimum level for the built-in console logger.
 * - `probeSettings` - What is sent to each provider.
 */
export type SelectorConstructorConfig = {
  settings?: {
    /**
     * Per-probe timeout as a fraction of the checking interval,
     * in the range (0, 1]. Defaults to `0.5`.
     */
    probeTimeoutRatio?: number;
    /**
     * The logging level to use for the selector. Ignored when `logger` is set.
     */
    logLevel?: LogLevel;
    /**
     * Chain ID handed to the `JsonRpcProvider` built by `getFastestRpcProvider`.
     * Without it the provider detects the network on first use.
     */
    chainId?: number;
  };
  probeSettings?: {
    /**
     * Defaults to a `web3_clientVersion` call.
     */
    payload?: JsonRpcPayload;
    headers?: Record<string, string>;
  };
  logger?: Logger;
  /**
   * Replaces the default axios transport, e.g. for WebSocket providers or tests.
   */
  transport?: ProbeTransport;
  /** Monotonic clock in milliseconds. Defaults to `performance.now()`. */
  clock?: () => number;
};
