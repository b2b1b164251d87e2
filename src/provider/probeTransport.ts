import axios, { AxiosError, AxiosRequestConfig } from 'axios';
import { ProbeTransport } from '../../types/selector';
import { NormalizedConfig } from '../config/resolveConfig';
import { ProbeError } from '../errors';

function hasRpcError(data: unknown): data is { error: unknown } {
  return typeof data === 'object' && data !== null && 'error' in data && data.error != null;
}

export function classifyProbeError(err: unknown): ProbeError {
  if (err instanceof ProbeError) return err;
  if (axios.isCancel(err)) return new ProbeError('cancelled', 'Probe request cancelled');
  if (err instanceof AxiosError) {
    if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') return new ProbeError('timeout', err.message);
    if (err.response) return new ProbeError('http-status', `HTTP ${err.response.status}`);
    return new ProbeError('connection', err.message);
  }
  return new ProbeError('connection', err instanceof Error ? err.message : String(err));
}

/**
 * Default transport: POSTs the probe payload and treats any 2xx answer
 * without a JSON-RPC `error` member as healthy.
 *
 * `axiosConfig` is merged into the axios instance, e.g. to set a proxy or adapter.
 */
export function createAxiosTransport(probe: NormalizedConfig['probe'], axiosConfig: AxiosRequestConfig = {}): ProbeTransport {
  const instance = axios.create({ ...axiosConfig, headers: probe.headers });

  return async (url, signal) => {
    let data: unknown;
    try {
      const res = await instance.post<unknown>(url, probe.payload, { signal });
      data = res.data;
    } catch (err) {
      throw classifyProbeError(err);
    }
    if (hasRpcError(data)) {
      throw new ProbeError('rpc-error', `Received error response: ${JSON.stringify(data.error)}`);
    }
  };
}
