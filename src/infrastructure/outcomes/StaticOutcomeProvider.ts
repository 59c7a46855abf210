import { EngagementOutcome, assertValidOutcome } from '../../domain/valueObjects/EngagementOutcome';
import { IOutcomeProvider } from '../../domain/services/IOutcomeProvider';

/**
 * Hands back an outcome the caller already has
 */
export class StaticOutcomeProvider implements IOutcomeProvider {
  private readonly outcome: EngagementOutcome;

  constructor(outcome: EngagementOutcome) {
    this.outcome = assertValidOutcome(outcome);
  }

  async estimate(): Promise<EngagementOutcome> {
    return this.outcome;
  }
}

/**
 * Leaves the iteration waiting until an outcome is submitted
 */
export class DeferredOutcomeProvider implements IOutcomeProvider {
  async estimate(): Promise<null> {
    return null;
  }
}
