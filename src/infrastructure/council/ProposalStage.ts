import { injectable, inject } from 'inversify';
import { Agent } from '../../domain/entities/Agent';
import { CampaignContext } from '../../domain/entities/CampaignContext';
import { Proposal } from '../../domain/entities/Proposal';
import { IGenerationService } from '../../domain/services/IGenerationService';
import { GenerationFailure } from '../../domain/errors/CouncilErrors';
import { CouncilConfig } from '../../config/councilConfig';
import { proposalRecordSchema, validateRecord } from './recordSchemas';
import { withTimeout } from './withTimeout';
import { logger } from '../logging/Logger';

@injectable()
export class ProposalStage {
  constructor(
    @inject('GenerationService') private generationService: IGenerationService,
    @inject('CouncilConfig') private config: CouncilConfig
  ) {}

  /**
   * Collects exactly one generation attempt per agent, in parallel. Proposals come back
   * grouped by agent in roster order. An agent whose attempt fails, times out or yields
   * nothing valid gets a single fallback proposal instead.
   */
  async propose(
    agents: ReadonlyArray<Agent>,
    context: CampaignContext,
    trends: ReadonlyArray<string>,
    iterationIndex: number
  ): Promise<Proposal[]> {
    const count = this.config.proposalsPerAgent;
    const agentContext: CampaignContext = { ...context, trends: [...trends] };

    logger.info('Proposal stage started', {
      iterationIndex,
      agents: agents.length,
      proposalsPerAgent: count,
      provider: this.generationService.providerName
    });

    const groups = await Promise.all(
      agents.map(agent => this.proposeForAgent(agent, agentContext, count, iterationIndex))
    );

    const proposals = groups.flat();
    logger.info('Proposal stage completed', {
      iterationIndex,
      proposals: proposals.length,
      fallbacks: proposals.filter(p => p.isFallback).length
    });

    return proposals;
  }

  private async proposeForAgent(
    agent: Agent,
    context: CampaignContext,
    count: number,
    iterationIndex: number
  ): Promise<Proposal[]> {
    const idFor = (index: number) => `${iterationIndex}:${agent.id}:${index}`;
    const startTime = Date.now();

    let records: unknown[];
    try {
      records = await withTimeout(
        this.generationService.generateProposals(agent, context, count),
        this.config.generationTimeoutMs,
        `Proposal generation for ${agent.id}`,
        agent.id
      );
    } catch (error) {
      const failure = error instanceof GenerationFailure
        ? error
        : new GenerationFailure(`Proposal generation failed for ${agent.id}`, agent.id, error);
      logger.warn('Proposal generation failed, using fallback proposal', {
        iterationIndex,
        agentId: agent.id,
        error: failure.message
      });
      return [Proposal.fallback(idFor(0), agent.id)];
    }

    const proposals: Proposal[] = [];
    for (const record of Array.isArray(records) ? records : []) {
      if (proposals.length >= count) {
        break;
      }
      const validation = validateRecord(proposalRecordSchema, record);
      if (!validation.ok) {
        logger.warn('Discarding invalid proposal record', {
          iterationIndex,
          agentId: agent.id,
          problems: validation.problems
        });
        continue;
      }
      const { platform, approach, reasoning, score } = validation.value;
      proposals.push(new Proposal(idFor(proposals.length), agent.id, platform.toLowerCase(), approach, reasoning, score));
    }

    if (proposals.length === 0) {
      logger.warn('No valid proposals generated, using fallback proposal', { iterationIndex, agentId: agent.id });
      return [Proposal.fallback(idFor(0), agent.id)];
    }

    logger.debug(`${agent.name} generated ${proposals.length} proposals`, {
      agentId: agent.id,
      processingTimeMs: Date.now() - startTime
    });

    return proposals;
  }
}
