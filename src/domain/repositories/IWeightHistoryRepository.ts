import { WeightHistoryEntry } from '../valueObjects/WeightHistoryEntry';

export interface IWeightHistoryRepository {
  /**
   * Appends one entry. Fails with DuplicateIterationError if the index is already present.
   */
  append(entry: WeightHistoryEntry): Promise<void>;
  list(): Promise<WeightHistoryEntry[]>;
  findByIndex(iterationIndex: number): Promise<WeightHistoryEntry | null>;
  latestIndex(): Promise<number>;
}
