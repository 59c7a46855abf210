import { injectable, inject } from 'inversify';
import { EngagementOutcome } from '../../domain/valueObjects/EngagementOutcome';
import { WeightHistoryEntry } from '../../domain/valueObjects/WeightHistoryEntry';
import { IWeightHistoryRepository } from '../../domain/repositories/IWeightHistoryRepository';
import { IAgentStateRepository } from '../../domain/repositories/IAgentStateRepository';
import { UnknownAgentError } from '../../domain/errors/CouncilErrors';
import { CouncilConfig, LearningSettings } from '../../config/councilConfig';
import { AgentRegistry } from './AgentRegistry';
import { logger } from '../logging/Logger';

export interface WeightUpdate {
  success: boolean;
  weights: Record<string, number>;
  entry: WeightHistoryEntry;
}

/**
 * Pure weight update. On success only the winner gains; otherwise every other agent loses.
 * Weights never drop below the floor.
 */
export function computeUpdate(
  weights: Readonly<Record<string, number>>,
  winnerId: string,
  outcome: EngagementOutcome,
  iterationIndex: number,
  settings: LearningSettings,
  now: Date = new Date()
): WeightUpdate {
  if (weights[winnerId] === undefined) {
    throw new UnknownAgentError(winnerId);
  }

  const success = outcome.overallScore > settings.successThreshold;
  const next: Record<string, number> = {};

  for (const [agentId, weight] of Object.entries(weights)) {
    let updated = weight;
    if (success && agentId === winnerId) {
      updated = weight + settings.successDelta * settings.learningRate;
    } else if (!success && agentId !== winnerId) {
      updated = weight - settings.failureDelta * settings.learningRate;
    }
    next[agentId] = round(Math.max(settings.weightFloor, updated));
  }

  return {
    success,
    weights: next,
    entry: {
      iterationIndex,
      timestamp: now.toISOString(),
      weights: { ...next },
      winnerId,
      outcomeScore: outcome.overallScore
    }
  };
}

@injectable()
export class LearningLoop {
  constructor(
    @inject('WeightHistoryRepository') private history: IWeightHistoryRepository,
    @inject('AgentStateRepository') private agentState: IAgentStateRepository,
    @inject('CouncilConfig') private config: CouncilConfig
  ) {}

  /**
   * Applies one outcome: the history entry is appended first, then the registry writes and
   * swaps in the new weights. If the second step fails, `rollForward` finishes it later from
   * the stored entry.
   */
  async update(
    registry: AgentRegistry,
    winnerId: string,
    outcome: EngagementOutcome,
    iterationIndex: number
  ): Promise<WeightUpdate> {
    const update = computeUpdate(registry.snapshot(), winnerId, outcome, iterationIndex, this.config.learning);

    await this.history.append(update.entry);
    await registry.commit(update.weights, winnerId, iterationIndex, this.agentState);

    logger.info('Agent weights updated', {
      iterationIndex,
      winnerId,
      outcomeScore: outcome.overallScore,
      success: update.success,
      weights: update.weights
    });

    return update;
  }

  /**
   * Brings the registry up to an entry already in the history
   */
  async rollForward(registry: AgentRegistry, entry: WeightHistoryEntry): Promise<boolean> {
    const applied = await registry.commit(entry.weights, entry.winnerId, entry.iterationIndex, this.agentState);
    if (applied) {
      logger.info('Rolled agent weights forward from history', {
        iterationIndex: entry.iterationIndex,
        winnerId: entry.winnerId
      });
    }
    return applied;
  }

  getHistory(): Promise<WeightHistoryEntry[]> {
    return this.history.list();
  }
}

function round(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}
