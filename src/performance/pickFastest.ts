import { ProbeSuccess, RoundResult } from '../../types/selector';

/**
 * Lowest latency wins; equal latencies go to the provider listed first.
 */
export function pickFastest(round: RoundResult): ProbeSuccess | null {
  let fastest: ProbeSuccess | null = null;
  for (const outcome of round) {
    if (!outcome.ok) continue;
    if (
      !fastest ||
      outcome.latencyMs < fastest.latencyMs ||
      (outcome.latencyMs === fastest.latencyMs && outcome.index < fastest.index)
    ) {
      fastest = outcome;
    }
  }
  return fastest;
}
