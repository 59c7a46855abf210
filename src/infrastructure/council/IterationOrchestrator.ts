import { injectable, inject } from 'inversify';
import { Mutex } from 'async-mutex';
import { Agent } from '../../domain/entities/Agent';
import { CampaignContext, freezeContext } from '../../domain/entities/CampaignContext';
import { Decision } from '../../domain/entities/Decision';
import { IterationRecord, IterationStatus } from '../../domain/entities/IterationRecord';
import { EngagementOutcome, assertValidOutcome } from '../../domain/valueObjects/EngagementOutcome';
import { RenderedContent } from '../../domain/valueObjects/RenderedContent';
import { WeightHistoryEntry } from '../../domain/valueObjects/WeightHistoryEntry';
import {
  ICouncilService,
  IterationComparison,
  RunIterationOptions
} from '../../domain/services/ICouncilService';
import { IOutcomeProvider } from '../../domain/services/IOutcomeProvider';
import { ITrendService } from '../../domain/services/ITrendService';
import { IContentRenderer } from '../../domain/services/IContentRenderer';
import { IIterationRepository } from '../../domain/repositories/IIterationRepository';
import { IWeightHistoryRepository } from '../../domain/repositories/IWeightHistoryRepository';
import { AppError } from '../../domain/errors/AppError';
import {
  IterationCancelledError,
  IterationStateError,
  PersistenceWriteError
} from '../../domain/errors/CouncilErrors';
import { CouncilConfig } from '../../config/councilConfig';
import { AgentRegistry } from './AgentRegistry';
import { ProposalStage } from './ProposalStage';
import { CritiqueStage } from './CritiqueStage';
import { ArbitrationStage } from './ArbitrationStage';
import { LearningLoop } from './LearningLoop';
import { IterationState, IterationStateMachine } from './IterationState';
import { CouncilEventEmitter } from './events/CouncilEventEmitter';
import { logger } from '../logging/Logger';

/**
 * Sequences proposal, critique, arbitration and learning for one iteration at a time.
 * Presentation layers only ever talk to this class.
 */
@injectable()
export class IterationOrchestrator implements ICouncilService {
  private readonly mutex = new Mutex();
  private readonly machine: IterationStateMachine;
  private activeIndex: number | null = null;

  constructor(
    @inject('AgentRegistry') private registry: AgentRegistry,
    @inject('ProposalStage') private proposalStage: ProposalStage,
    @inject('CritiqueStage') private critiqueStage: CritiqueStage,
    @inject('ArbitrationStage') private arbitrationStage: ArbitrationStage,
    @inject('LearningLoop') private learningLoop: LearningLoop,
    @inject('TrendService') private trendService: ITrendService,
    @inject('ContentRenderer') private contentRenderer: IContentRenderer,
    @inject('IterationRepository') private iterations: IIterationRepository,
    @inject('WeightHistoryRepository') private history: IWeightHistoryRepository,
    @inject('CouncilEventEmitter') private events: CouncilEventEmitter,
    @inject('CouncilConfig') private config: CouncilConfig
  ) {
    this.machine = new IterationStateMachine((from, to) => {
      this.events.publish('state', {
        iterationIndex: this.activeIndex,
        from,
        to,
        timestamp: new Date()
      });
    });
  }

  /**
   * Resolves once no iteration, outcome submission or recovery is running
   */
  drain(): Promise<void> {
    return this.mutex.waitForUnlock();
  }

  getState(): IterationState {
    return this.machine.state;
  }

  async runIteration(
    context: CampaignContext,
    outcomeProvider: IOutcomeProvider,
    options: RunIterationOptions = {}
  ): Promise<IterationRecord> {
    return this.mutex.runExclusive(async () => {
      const pending = await this.iterations.findPending();
      if (pending) {
        throw new IterationStateError(
          `Iteration ${pending.iterationIndex} is still waiting for its outcome`,
          { iterationIndex: pending.iterationIndex }
        );
      }
      if (!this.machine.is(IterationState.IDLE)) {
        throw new IterationStateError(`Council is busy (${this.machine.state})`, { state: this.machine.state });
      }

      const frozen = freezeContext(context);
      const iterationIndex = await this.nextIndex();
      this.activeIndex = iterationIndex;

      const record = await this.decide(frozen, iterationIndex, options.signal);

      let outcome: EngagementOutcome | null;
      try {
        const estimated = await outcomeProvider.estimate(record);
        outcome = estimated === null ? null : assertValidOutcome(estimated);
      } catch (error) {
        logger.error('No usable outcome from provider, iteration left waiting for its outcome', {
          iterationIndex,
          error: error instanceof Error ? error.message : 'Unknown error'
        });
        outcome = null;
      }

      if (outcome === null) {
        logger.info('Iteration waiting for outcome', { iterationIndex, winnerId: record.decision.winnerId });
        this.events.publish('iteration', record);
        return record;
      }

      return this.complete(record, outcome);
    });
  }

  async submitOutcome(iterationIndex: number, outcome: EngagementOutcome): Promise<IterationRecord> {
    assertValidOutcome(outcome);

    return this.mutex.runExclusive(async () => {
      const record = await this.iterations.findByIndex(iterationIndex);
      if (!record) {
        throw AppError.notFound(`Iteration ${iterationIndex} not found`);
      }
      if (record.status === IterationStatus.COMPLETED) {
        throw new IterationStateError(`Iteration ${iterationIndex} already has an outcome`, { iterationIndex });
      }

      this.resumeAwaiting(iterationIndex);
      return this.complete(record, outcome);
    });
  }

  /**
   * Picks up an iteration left waiting by a previous process. When the history already holds
   * its entry, the weights are rolled forward from that entry and the record is completed;
   * otherwise it keeps waiting for `submitOutcome`. Returns the pending or recovered record.
   */
  async recover(): Promise<IterationRecord | null> {
    return this.mutex.runExclusive(async () => {
      const pending = await this.iterations.findPending();
      if (!pending) {
        return null;
      }

      const iterationIndex = pending.iterationIndex;
      this.resumeAwaiting(iterationIndex);

      const entry = await this.history.findByIndex(iterationIndex);
      if (!entry) {
        logger.info('Recovered iteration is waiting for its outcome', { iterationIndex });
        return pending;
      }

      logger.warn('Completing iteration interrupted during learning', { iterationIndex });
      return this.complete(pending, { overallScore: entry.outcomeScore, source: 'recovered' });
    });
  }

  async getIteration(iterationIndex: number): Promise<IterationRecord> {
    const record = await this.iterations.findByIndex(iterationIndex);
    if (!record) {
      throw AppError.notFound(`Iteration ${iterationIndex} not found`);
    }
    return record;
  }

  listAgents(): ReadonlyArray<Agent> {
    return this.registry.list();
  }

  getHistory(): Promise<WeightHistoryEntry[]> {
    return this.learningLoop.getHistory();
  }

  async getWeightSeries(): Promise<Record<string, number[]>> {
    const entries = await this.history.list();
    const series: Record<string, number[]> = {};
    for (const agentId of this.registry.ids()) {
      series[agentId] = entries.map(entry => entry.weights[agentId]);
    }
    return series;
  }

  async compareIterations(a: number, b: number): Promise<IterationComparison> {
    const [first, second] = await Promise.all([this.completedSummary(a), this.completedSummary(b)]);
    return {
      iterationA: first,
      iterationB: second,
      winnerChanged: first.winnerId !== second.winnerId,
      scoreDelta: Math.round((second.outcomeScore - first.outcomeScore) * 1e6) / 1e6
    };
  }

  private async decide(
    context: CampaignContext,
    iterationIndex: number,
    signal?: AbortSignal
  ): Promise<IterationRecord> {
    const startedAt = new Date().toISOString();

    try {
      this.throwIfCancelled(signal, iterationIndex);
      const trends = await this.resolveTrends(context);
      const agents = this.registry.list();

      logger.info('Iteration started', {
        iterationIndex,
        agents: agents.map(agent => agent.id),
        trends: trends.length
      });

      this.machine.transition(IterationState.PROPOSING);
      const proposals = await this.proposalStage.propose(agents, context, trends, iterationIndex);
      this.throwIfCancelled(signal, iterationIndex);

      this.machine.transition(IterationState.CRITIQUING);
      const critiques = await this.critiqueStage.critique(agents, proposals, context);
      this.throwIfCancelled(signal, iterationIndex);

      this.machine.transition(IterationState.ARBITRATING);
      const weightsBefore = this.registry.snapshot();
      const decision = this.arbitrationStage.decide(proposals, critiques, weightsBefore);

      logger.info('Arbitration decided', {
        iterationIndex,
        winnerId: decision.winnerId,
        proposalId: decision.proposalId,
        agentScores: decision.agentScores
      });

      const record: IterationRecord = {
        iterationIndex,
        status: IterationStatus.AWAITING_OUTCOME,
        startedAt,
        completedAt: null,
        context,
        trends,
        proposals,
        critiques,
        decision,
        content: this.renderContent(decision, context, iterationIndex),
        weightsBefore,
        weightsAfter: null,
        outcome: null
      };

      await this.iterations.save(record);
      this.machine.transition(IterationState.AWAITING_OUTCOME);
      return record;
    } catch (error) {
      if (!this.machine.is(IterationState.IDLE)) {
        this.machine.transition(IterationState.IDLE);
      }
      this.activeIndex = null;
      logger.warn('Iteration aborted before a decision was stored', {
        iterationIndex,
        error: error instanceof Error ? error.message : 'Unknown error'
      });
      throw error;
    }
  }

  private async complete(record: IterationRecord, outcome: EngagementOutcome): Promise<IterationRecord> {
    assertValidOutcome(outcome);
    const iterationIndex = record.iterationIndex;
    const winnerId = record.decision.winnerId;

    this.machine.transition(IterationState.LEARNING);
    try {
      let weightsAfter: Record<string, number>;
      let appliedOutcome = outcome;

      const existing = await this.history.findByIndex(iterationIndex);
      if (existing) {
        await this.learningLoop.rollForward(this.registry, existing);
        weightsAfter = { ...existing.weights };
        if (existing.outcomeScore !== outcome.overallScore) {
          logger.warn('Keeping the outcome already recorded in history', {
            iterationIndex,
            recorded: existing.outcomeScore,
            submitted: outcome.overallScore
          });
          appliedOutcome = { overallScore: existing.outcomeScore, source: 'recovered' };
        }
      } else {
        const update = await this.learningLoop.update(this.registry, winnerId, outcome, iterationIndex);
        weightsAfter = update.weights;
      }

      const completed: IterationRecord = {
        ...record,
        status: IterationStatus.COMPLETED,
        completedAt: new Date().toISOString(),
        weightsAfter,
        outcome: appliedOutcome
      };

      try {
        await this.iterations.save(completed);
      } catch (error) {
        throw error instanceof PersistenceWriteError ? error : new PersistenceWriteError('iteration record', error);
      }

      this.machine.transition(IterationState.IDLE);
      this.activeIndex = null;

      logger.info('Iteration completed', {
        iterationIndex,
        winnerId,
        outcomeScore: appliedOutcome.overallScore,
        weights: weightsAfter
      });
      this.events.publish('iteration', completed);
      return completed;
    } catch (error) {
      this.machine.transition(IterationState.AWAITING_OUTCOME);
      logger.error('Learning step failed, outcome can be resubmitted', {
        iterationIndex,
        error: error instanceof Error ? error.message : 'Unknown error'
      });
      throw error;
    }
  }

  private resumeAwaiting(iterationIndex: number): void {
    this.activeIndex = iterationIndex;
    if (this.machine.is(IterationState.IDLE)) {
      this.machine.transition(IterationState.AWAITING_OUTCOME);
    }
  }

  private async nextIndex(): Promise<number> {
    const [historyLatest, iterationsLatest] = await Promise.all([
      this.history.latestIndex(),
      this.iterations.latestIndex()
    ]);
    return Math.max(historyLatest, iterationsLatest, this.registry.getAppliedIteration()) + 1;
  }

  private async resolveTrends(context: CampaignContext): Promise<string[]> {
    if (context.trends !== undefined) {
      return [...context.trends];
    }
    try {
      return await this.trendService.fetchTrends(context.industry, this.config.trendLimit);
    } catch (error) {
      logger.warn('Trend lookup failed, continuing without trends', {
        industry: context.industry,
        error: error instanceof Error ? error.message : 'Unknown error'
      });
      return [];
    }
  }

  private renderContent(decision: Decision, context: CampaignContext, iterationIndex: number): RenderedContent | null {
    try {
      return this.contentRenderer.render(decision, context);
    } catch (error) {
      logger.warn('Content rendering failed', {
        iterationIndex,
        error: error instanceof Error ? error.message : 'Unknown error'
      });
      return null;
    }
  }

  private throwIfCancelled(signal: AbortSignal | undefined, iterationIndex: number): void {
    if (signal && signal.aborted) {
      throw new IterationCancelledError(iterationIndex);
    }
  }

  private async completedSummary(iterationIndex: number): Promise<IterationComparison['iterationA']> {
    const record = await this.getIteration(iterationIndex);
    if (record.status !== IterationStatus.COMPLETED || !record.outcome || !record.weightsAfter) {
      throw new IterationStateError(`Iteration ${iterationIndex} has no outcome yet`, { iterationIndex });
    }
    return {
      index: record.iterationIndex,
      winnerId: record.decision.winnerId,
      outcomeScore: record.outcome.overallScore,
      weights: { ...record.weightsAfter }
    };
  }
}
