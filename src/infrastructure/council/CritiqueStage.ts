import { injectable, inject } from 'inversify';
import { Agent } from '../../domain/entities/Agent';
import { CampaignContext } from '../../domain/entities/CampaignContext';
import { Critique } from '../../domain/entities/Critique';
import { Proposal } from '../../domain/entities/Proposal';
import { IGenerationService } from '../../domain/services/IGenerationService';
import { CouncilConfig } from '../../config/councilConfig';
import { critiqueRecordSchema, validateRecord } from './recordSchemas';
import { withTimeout } from './withTimeout';
import { logger } from '../logging/Logger';

@injectable()
export class CritiqueStage {
  constructor(
    @inject('GenerationService') private generationService: IGenerationService,
    @inject('CouncilConfig') private config: CouncilConfig
  ) {}

  /**
   * Every agent critiques every proposal it does not own, exactly once. Must only be
   * called with the complete proposal set of an iteration.
   */
  async critique(
    critics: ReadonlyArray<Agent>,
    proposals: ReadonlyArray<Proposal>,
    context: CampaignContext
  ): Promise<Critique[]> {
    const pairs: Array<{ critic: Agent; proposal: Proposal }> = [];
    for (const critic of critics) {
      for (const proposal of proposals) {
        if (proposal.agentId !== critic.id) {
          pairs.push({ critic, proposal });
        }
      }
    }

    logger.info('Critique stage started', { critics: critics.length, proposals: proposals.length, pairs: pairs.length });

    const critiques = await Promise.all(pairs.map(({ critic, proposal }) => this.critiquePair(critic, proposal, context)));

    logger.info('Critique stage completed', {
      critiques: critiques.length,
      degraded: critiques.filter(c => c.degraded).length
    });

    return critiques;
  }

  private async critiquePair(critic: Agent, proposal: Proposal, context: CampaignContext): Promise<Critique> {
    const id = `${proposal.id}<${critic.id}`;

    try {
      const record = await withTimeout(
        this.generationService.generateCritique(critic, proposal, context),
        this.config.generationTimeoutMs,
        `Critique by ${critic.id} of ${proposal.id}`,
        critic.id
      );

      const validation = validateRecord(critiqueRecordSchema, record);
      if (!validation.ok) {
        logger.warn('Invalid critique record, recording degraded critique', {
          criticId: critic.id,
          proposalId: proposal.id,
          problems: validation.problems
        });
        return Critique.degraded(id, critic.id, proposal.id);
      }

      return new Critique(id, critic.id, proposal.id, validation.value.category, validation.value.detail);
    } catch (error) {
      logger.warn('Critique generation failed, recording degraded critique', {
        criticId: critic.id,
        proposalId: proposal.id,
        error: error instanceof Error ? error.message : 'Unknown error'
      });
      return Critique.degraded(id, critic.id, proposal.id);
    }
  }
}
