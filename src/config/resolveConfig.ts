import { JsonRpcPayload, SelectorConstructorConfig } from '../../types/selector';
import { DEFAULT_LOG_LEVEL, DEFAULT_PROBE_PAYLOAD, DEFAULT_PROBE_TIMEOUT_RATIO } from '../constants';
import { ConfigurationError } from '../errors';
import { LogLevel } from '../logging/logger';

export interface NormalizedConfig {
  /** Provider URLs in the order they were given */
  urls: readonly string[];
  /** Delay between the start of two measurement rounds (in milliseconds) */
  intervalMs: number;
  /** Timeout for a single latency probe (in milliseconds) */
  probeTimeoutMs: number;
  probe: {
    payload: JsonRpcPayload;
    headers: Record<string, string>;
  };
  settings: {
    /** Log level for this package. */
    logLevel: LogLevel;
    chainId?: number;
  };
}

// setTimeout clamps anything longer to 1ms
const MAX_INTERVAL_MS = 2 ** 31 - 1;

export function resolveConfig(urls: readonly string[], intervalMs: number, config: SelectorConstructorConfig = {}): NormalizedConfig {
  if (!Array.isArray(urls) || urls.length === 0) {
    throw new ConfigurationError('At least one provider URL is required');
  }
  if (typeof intervalMs !== 'number' || !Number.isFinite(intervalMs) || intervalMs <= 0) {
    throw new ConfigurationError(`Checking interval must be a positive number of milliseconds, got ${intervalMs}`);
  }
  if (intervalMs > MAX_INTERVAL_MS) {
    throw new ConfigurationError(`Checking interval must not exceed ${MAX_INTERVAL_MS}ms, got ${intervalMs}`);
  }
  const ratio = config.settings?.probeTimeoutRatio ?? DEFAULT_PROBE_TIMEOUT_RATIO;
  if (!Number.isFinite(ratio) || ratio <= 0 || ratio > 1) {
    throw new ConfigurationError(`probeTimeoutRatio must be within (0, 1], got ${ratio}`);
  }

  return {
    urls: [...urls],
    intervalMs,
    probeTimeoutMs: intervalMs * ratio,
    probe: {
      payload: config.probeSettings?.payload ?? DEFAULT_PROBE_PAYLOAD,
      headers: { 'Content-Type': 'application/json', ...(config.probeSettings?.headers ?? {}) },
    },
    settings: {
      logLevel: config.settings?.logLevel ?? DEFAULT_LOG_LEVEL,
      chainId: config.settings?.chainId,
    },
  };
}
