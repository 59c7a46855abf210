import { IterationRecord } from '../entities/IterationRecord';

export interface IIterationRepository {
  save(record: IterationRecord): Promise<void>;
  findByIndex(iterationIndex: number): Promise<IterationRecord | null>;
  findPending(): Promise<IterationRecord | null>;
  latestIndex(): Promise<number>;
}
