import type { JsonRpcPayload } from '../types/selector';
import type { LogLevel } from './logging/logger';

export const DEFAULT_PROBE_TIMEOUT_RATIO = 0.5;

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

// Cheap call every node answers without touching chain state
export const DEFAULT_PROBE_PAYLOAD: JsonRpcPayload = {
  jsonrpc: '2.0',
  method: 'web3_clientVersion',
  params: [],
  id: 1,
};
