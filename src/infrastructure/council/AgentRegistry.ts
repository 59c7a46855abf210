import { injectable, inject } from 'inversify';
import { Agent } from '../../domain/entities/Agent';
import { IAgentStateRepository } from '../../domain/repositories/IAgentStateRepository';
import { ConfigError, PersistenceWriteError, UnknownAgentError } from '../../domain/errors/CouncilErrors';
import { CouncilConfig } from '../../config/councilConfig';
import { rosterSchema, validateRecord } from './recordSchemas';
import { logger } from '../logging/Logger';

/**
 * Holds the fixed roster of council agents and their learned voting weights.
 * The set of ids is fixed once loaded; weights only change through `commit`,
 * which the learning loop drives.
 */
@injectable()
export class AgentRegistry {
  private agents: Map<string, Agent> = new Map();
  private appliedIteration = 0;
  private loaded = false;

  constructor(@inject('CouncilConfig') private config: CouncilConfig) {}

  async load(source: IAgentStateRepository): Promise<Agent[]> {
    const raw = await source.load();
    const validation = validateRecord(rosterSchema, raw);

    if (!validation.ok) {
      const { problems } = validation;
      logger.error('Agent roster validation failed', { problems });
      throw new ConfigError(`Invalid agent roster: ${problems.map(p => p.message).join('; ')}`, problems);
    }
    const value = validation.value;

    const floor = this.config.learning.weightFloor;
    const next = new Map<string, Agent>();
    for (const record of value.agents) {
      const weight = this.clamp(record.weight);
      if (weight !== record.weight) {
        logger.warn('Agent weight raised to floor on load', { agentId: record.id, weight: record.weight, floor });
      }
      next.set(record.id, Agent.fromRecord({ ...record, name: record.name || record.id, weight }));
    }

    if (this.loaded) {
      const currentIds = [...this.agents.keys()].sort();
      const nextIds = [...next.keys()].sort();
      if (currentIds.join('\u0000') !== nextIds.join('\u0000')) {
        throw new ConfigError('Agent ids cannot change for a loaded registry', { currentIds, nextIds });
      }
    }

    this.agents = next;
    this.appliedIteration = value.appliedIteration;
    this.loaded = true;

    logger.info('Agent registry loaded', {
      agents: [...next.keys()],
      appliedIteration: this.appliedIteration
    });

    return this.list();
  }

  isLoaded(): boolean {
    return this.loaded;
  }

  list(): Agent[] {
    this.ensureLoaded();
    return [...this.agents.values()];
  }

  ids(): string[] {
    this.ensureLoaded();
    return [...this.agents.keys()];
  }

  getAgent(agentId: string): Agent {
    this.ensureLoaded();
    const agent = this.agents.get(agentId);
    if (!agent) {
      throw new UnknownAgentError(agentId);
    }
    return agent;
  }

  getWeight(agentId: string): number {
    return this.getAgent(agentId).weight;
  }

  /**
   * Sets an in-memory weight, raised to the configured floor
   */
  setWeight(agentId: string, value: number): number {
    const agent = this.getAgent(agentId);
    const weight = this.clamp(value);
    this.agents.set(agentId, agent.withWeight(weight));
    return weight;
  }

  /**
   * Value copy of the current weights
   */
  snapshot(): Record<string, number> {
    this.ensureLoaded();
    const weights: Record<string, number> = {};
    for (const [id, agent] of this.agents) {
      weights[id] = agent.weight;
    }
    return weights;
  }

  getAppliedIteration(): number {
    return this.appliedIteration;
  }

  async persist(destination: IAgentStateRepository): Promise<void> {
    this.ensureLoaded();
    await this.write(destination, [...this.agents.values()], this.appliedIteration);
  }

  /**
   * Writes the weights of a finished iteration and only then swaps them in, so a failed
   * write leaves the last committed weights in place. Re-committing an iteration that is
   * already applied is a no-op.
   */
  async commit(
    weights: Readonly<Record<string, number>>,
    winnerId: string,
    iterationIndex: number,
    destination: IAgentStateRepository
  ): Promise<boolean> {
    this.ensureLoaded();
    this.getAgent(winnerId);

    if (iterationIndex <= this.appliedIteration) {
      logger.info('Iteration already applied to registry, skipping commit', {
        iterationIndex,
        appliedIteration: this.appliedIteration
      });
      return false;
    }

    const next = new Map<string, Agent>();
    for (const [id, agent] of this.agents) {
      const weight = weights[id];
      if (weight === undefined) {
        throw new UnknownAgentError(id);
      }
      next.set(id, agent.withWeight(this.clamp(weight)).withResult(id === winnerId));
    }
    for (const id of Object.keys(weights)) {
      if (!next.has(id)) {
        throw new UnknownAgentError(id);
      }
    }

    await this.write(destination, [...next.values()], iterationIndex);

    this.agents = next;
    this.appliedIteration = iterationIndex;
    return true;
  }

  private async write(destination: IAgentStateRepository, agents: Agent[], appliedIteration: number): Promise<void> {
    try {
      await destination.save({
        appliedIteration,
        agents: agents.map(agent => agent.toRecord())
      });
    } catch (error) {
      if (error instanceof PersistenceWriteError) {
        throw error;
      }
      throw new PersistenceWriteError('agent state', error);
    }
  }

  private clamp(value: number): number {
    return Math.max(this.config.learning.weightFloor, value);
  }

  private ensureLoaded(): void {
    if (!this.loaded) {
      throw new ConfigError('Agent registry has not been loaded');
    }
  }
}
