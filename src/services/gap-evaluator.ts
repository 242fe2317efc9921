import type { GapEvaluation, PriceObservation } from '../types.js';
import { relativeGapExceeds } from '../utils/decimal.js';

export class GapEvaluator {
  /**
   * Compares the latest own price against the cheapest observation of the latest
   * competitor round. Returns null when the gap cannot be computed: either side is
   * missing, or the cheapest competitor price is zero.
   */
  evaluate(
    ownLatest: PriceObservation | undefined,
    competitorRound: readonly PriceObservation[]
  ): GapEvaluation | null {
    if (!ownLatest) return null;

    const cheapest = GapEvaluator.cheapestOfLatestRound(competitorRound);
    if (!cheapest) return null;
    if (cheapest.price === 0) return null;

    return {
      ownPrice: ownLatest.price,
      minCompetitorPrice: cheapest.price,
      gapPct: (ownLatest.price - cheapest.price) / cheapest.price,
      ownObservation: ownLatest,
      chosenCompetitorObservation: cheapest,
    };
  }

  /**
   * Strict `gap > threshold`, computed on the decimal prices. `gapPct` is only for
   * display and storage: as a float, 1.10 against 1.00 comes out above 0.10.
   */
  exceedsThreshold(evaluation: GapEvaluation, threshold: number): boolean {
    return relativeGapExceeds(evaluation.ownPrice, evaluation.minCompetitorPrice, threshold);
  }

  /**
   * Keeps only the observations captured at the most recent timestamp, then picks the
   * lowest price. Ties go to the first observation in input order.
   */
  static cheapestOfLatestRound(observations: readonly PriceObservation[]): PriceObservation | undefined {
    let latestAt = -Infinity;
    for (const observation of observations) {
      latestAt = Math.max(latestAt, observation.capturedAt.getTime());
    }

    let cheapest: PriceObservation | undefined;
    for (const observation of observations) {
      if (observation.capturedAt.getTime() !== latestAt) continue;
      if (!cheapest || observation.price < cheapest.price) {
        cheapest = observation;
      }
    }
    return cheapest;
  }
}
