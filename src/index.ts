export * from './rpc-selector';
export * from './errors';
export { createProvider } from './provider/createProvider';
export { createAxiosTransport, classifyProbeError } from './provider/probeTransport';
export { measureRound } from './performance/measure';
export { pickFastest } from './performance/pickFastest';
export { BasicLogger, NoopLogger } from './logging/logger';
export type { Logger, LogLevel, LogMetadata } from './logging/logger';
export { DEFAULT_PROBE_PAYLOAD, DEFAULT_PROBE_TIMEOUT_RATIO } from './constants';
