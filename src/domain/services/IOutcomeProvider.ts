import { IterationRecord } from '../entities/IterationRecord';
import { EngagementOutcome } from '../valueObjects/EngagementOutcome';

export interface IOutcomeProvider {
  /**
   * Estimates engagement for a decided iteration. `null` leaves the iteration
   * waiting for an outcome to be submitted later.
   */
  estimate(record: IterationRecord): Promise<EngagementOutcome | null>;
}
