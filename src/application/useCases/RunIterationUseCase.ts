import { injectable, inject } from 'inversify';
import { CampaignContext } from '../../domain/entities/CampaignContext';
import { IterationRecord } from '../../domain/entities/IterationRecord';
import { EngagementOutcome } from '../../domain/valueObjects/EngagementOutcome';
import { ICouncilService } from '../../domain/services/ICouncilService';
import { IOutcomeProvider } from '../../domain/services/IOutcomeProvider';
import { DeferredOutcomeProvider, StaticOutcomeProvider } from '../../infrastructure/outcomes/StaticOutcomeProvider';
import { logger } from '../../infrastructure/logging/Logger';

export interface RunIterationInput {
  context: CampaignContext;
  /** known engagement outcome; skips estimation */
  outcome?: Omit<EngagementOutcome, 'source'>;
  /** leave the iteration waiting for a later outcome submission */
  deferOutcome?: boolean;
  signal?: AbortSignal;
}

@injectable()
export class RunIterationUseCase {
  constructor(
    @inject('ICouncilService') private councilService: ICouncilService,
    @inject('SimulatedOutcomeProvider') private simulatedOutcomes: IOutcomeProvider
  ) {}

  async execute(input: RunIterationInput): Promise<IterationRecord> {
    const provider = this.selectProvider(input);
    const record = await this.councilService.runIteration(input.context, provider, { signal: input.signal });

    logger.info('Run iteration request handled', {
      iterationIndex: record.iterationIndex,
      status: record.status,
      winnerId: record.decision.winnerId
    });
    return record;
  }

  private selectProvider(input: RunIterationInput): IOutcomeProvider {
    if (input.outcome) {
      return new StaticOutcomeProvider({ ...input.outcome, source: 'supplied' });
    }
    if (input.deferOutcome) {
      return new DeferredOutcomeProvider();
    }
    return this.simulatedOutcomes;
  }
}
