import { RoundResult, SelectionSnapshot } from '../../types/selector';
import { pickFastest } from '../performance/pickFastest';

const INITIAL_SNAPSHOT: SelectionSnapshot = Object.freeze({ generation: 0 });

/**
 * Owns the published selection. Only the round callback writes to it;
 * every write swaps in a new frozen snapshot, so readers never see a mix
 * of two generations.
 */
export class Selector {
  private snapshot: SelectionSnapshot = INITIAL_SNAPSHOT;

  current(): SelectionSnapshot {
    return this.snapshot;
  }

  /**
   * Publishes the fastest provider of `round`. A round without any success
   * keeps the previous snapshot, generation included.
   */
  publish(round: RoundResult): SelectionSnapshot {
    const fastest = pickFastest(round);
    if (!fastest) return this.snapshot;
    this.snapshot = Object.freeze({
      fastestUrl: fastest.url,
      latencyMs: fastest.latencyMs,
      generation: this.snapshot.generation + 1,
    });
    return this.snapshot;
  }
}
