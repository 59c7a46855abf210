import { AppError } from '../errors/AppError';

export type OutcomeSource = 'simulated' | 'supplied' | 'recovered';

export interface EngagementOutcome {
  /** 0-10 */
  readonly overallScore: number;
  readonly predictedReach?: number;
  /** 0-10, share of risk flags raised against the chosen proposal */
  readonly riskScore?: number;
  readonly source: OutcomeSource;
  readonly metrics?: Readonly<Record<string, number>>;
}

export function assertValidOutcome(outcome: EngagementOutcome): EngagementOutcome {
  if (!Number.isFinite(outcome.overallScore) || outcome.overallScore < 0 || outcome.overallScore > 10) {
    throw AppError.validationError('Outcome score must be between 0 and 10', {
      overallScore: outcome.overallScore
    });
  }
  return outcome;
}
