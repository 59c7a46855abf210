import { injectable } from 'inversify';
import { AgentStateDocument, IAgentStateRepository } from '../../domain/repositories/IAgentStateRepository';
import { IIterationRepository } from '../../domain/repositories/IIterationRepository';
import { IWeightHistoryRepository } from '../../domain/repositories/IWeightHistoryRepository';
import { IterationRecord, IterationStatus } from '../../domain/entities/IterationRecord';
import { WeightHistoryEntry } from '../../domain/valueObjects/WeightHistoryEntry';
import { DuplicateIterationError, IterationStateError } from '../../domain/errors/CouncilErrors';

/**
 * Keeps the roster in memory. The seed loader runs once, on the first load.
 */
export class InMemoryAgentStateRepository implements IAgentStateRepository {
  private document: unknown;
  private seeded = false;

  constructor(private readonly seed: () => Promise<unknown>) {}

  async load(): Promise<unknown> {
    if (!this.seeded) {
      this.document = clone(await this.seed());
      this.seeded = true;
    }
    return clone(this.document);
  }

  async save(document: AgentStateDocument): Promise<void> {
    this.document = clone(document);
    this.seeded = true;
  }
}

@injectable()
export class InMemoryWeightHistoryRepository implements IWeightHistoryRepository {
  private entries: WeightHistoryEntry[] = [];

  async append(entry: WeightHistoryEntry): Promise<void> {
    if (this.entries.some(existing => existing.iterationIndex === entry.iterationIndex)) {
      throw new DuplicateIterationError(entry.iterationIndex);
    }
    const latest = await this.latestIndex();
    if (entry.iterationIndex <= latest) {
      throw new IterationStateError(
        `Weight history index ${entry.iterationIndex} does not follow ${latest}`,
        { iterationIndex: entry.iterationIndex, latest }
      );
    }
    this.entries.push({ ...entry, weights: { ...entry.weights } });
  }

  async list(): Promise<WeightHistoryEntry[]> {
    return [...this.entries];
  }

  async findByIndex(iterationIndex: number): Promise<WeightHistoryEntry | null> {
    return this.entries.find(entry => entry.iterationIndex === iterationIndex) || null;
  }

  async latestIndex(): Promise<number> {
    return this.entries.length > 0 ? this.entries[this.entries.length - 1].iterationIndex : 0;
  }
}

@injectable()
export class InMemoryIterationRepository implements IIterationRepository {
  private records: Map<number, IterationRecord> = new Map();

  async save(record: IterationRecord): Promise<void> {
    this.records.set(record.iterationIndex, record);
  }

  async findByIndex(iterationIndex: number): Promise<IterationRecord | null> {
    return this.records.get(iterationIndex) || null;
  }

  async findPending(): Promise<IterationRecord | null> {
    for (const record of this.records.values()) {
      if (record.status === IterationStatus.AWAITING_OUTCOME) {
        return record;
      }
    }
    return null;
  }

  async latestIndex(): Promise<number> {
    return Math.max(0, ...this.records.keys());
  }
}

function clone(value: unknown): unknown {
  return value === undefined ? undefined : JSON.parse(JSON.stringify(value));
}
