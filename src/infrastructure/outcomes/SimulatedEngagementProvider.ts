import { CritiqueCategory } from '../../domain/entities/Critique';
import { IterationRecord } from '../../domain/entities/IterationRecord';
import { EngagementOutcome } from '../../domain/valueObjects/EngagementOutcome';
import { IOutcomeProvider } from '../../domain/services/IOutcomeProvider';

export type RandomSource = () => number;

/**
 * Estimates engagement from random draws in fixed ranges. Not a measurement; it stands in
 * for feedback the council never receives.
 */
export class SimulatedEngagementProvider implements IOutcomeProvider {
  constructor(private random: RandomSource = Math.random) {}

  async estimate(record: IterationRecord): Promise<EngagementOutcome> {
    const likes = this.randInt(2000, 8000);
    const shares = this.randInt(100, 500);
    const comments = this.randInt(50, 200);
    const sentiment = round(0.6 + this.random() * 0.3, 2);

    const overallScore = round(
      Math.min(10, (likes / 1000) * 0.4 + (shares / 100) * 0.3 + (comments / 50) * 0.2 + sentiment * 10 * 0.1),
      2
    );

    const received = record.critiques.filter(critique => critique.proposalId === record.decision.proposalId);
    const risks = received.filter(critique => critique.category === CritiqueCategory.RISK && !critique.degraded);
    const riskScore = received.length === 0 ? 0 : round((risks.length / received.length) * 10, 2);

    return {
      overallScore,
      predictedReach: likes + shares * 10 + comments,
      riskScore,
      source: 'simulated',
      metrics: { likes, shares, comments, sentiment }
    };
  }

  private randInt(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}
