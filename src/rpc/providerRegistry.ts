import { ProbeFailure, ProviderRecord, RoundResult } from '../../types/selector';

export function createProviderRecords(urls: readonly string[]): ProviderRecord[] {
  return urls.map((url) => ({ url, consecutiveFailures: 0 }));
}

/**
 * Writes each outcome onto the record at the same index and returns the
 * failures, with the record's updated failure streak.
 */
export function applyRoundResult(
  records: ProviderRecord[],
  round: RoundResult
): Array<ProbeFailure & { consecutiveFailures: number }> {
  const failures: Array<ProbeFailure & { consecutiveFailures: number }> = [];
  for (const outcome of round) {
    const record = records[outcome.index];
    if (!record) continue;
    if (outcome.ok) {
      record.lastLatency = outcome.latencyMs;
      record.lastError = undefined;
      record.consecutiveFailures = 0;
    } else {
      record.lastLatency = undefined;
      record.lastError = outcome.kind;
      record.consecutiveFailures++;
      failures.push({ ...outcome, consecutiveFailures: record.consecutiveFailures });
    }
  }
  return failures;
}

// Latencies keyed by URL; the first record wins when a URL is listed twice
export function latencyMap(records: readonly ProviderRecord[]): Record<string, number> {
  const latencies: Record<string, number> = {};
  for (const record of records) {
    if (record.lastLatency === undefined || record.url in latencies) continue;
    latencies[record.url] = record.lastLatency;
  }
  return latencies;
}
