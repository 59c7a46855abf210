import { injectable, inject } from 'inversify';
import { IterationRecord } from '../../domain/entities/IterationRecord';
import { EngagementOutcome } from '../../domain/valueObjects/EngagementOutcome';
import { ICouncilService } from '../../domain/services/ICouncilService';

export interface SubmitOutcomeInput {
  iterationIndex: number;
  outcome: Omit<EngagementOutcome, 'source'>;
}

@injectable()
export class SubmitOutcomeUseCase {
  constructor(@inject('ICouncilService') private councilService: ICouncilService) {}

  execute(input: SubmitOutcomeInput): Promise<IterationRecord> {
    return this.councilService.submitOutcome(input.iterationIndex, { ...input.outcome, source: 'supplied' });
  }
}
