import { promises as fs } from 'fs';
import path from 'path';
import { IWeightHistoryRepository } from '../../domain/repositories/IWeightHistoryRepository';
import { WeightHistoryEntry } from '../../domain/valueObjects/WeightHistoryEntry';
import {
  ConfigError,
  DuplicateIterationError,
  IterationStateError,
  PersistenceWriteError
} from '../../domain/errors/CouncilErrors';
import { readFileIfExists, writeFileAtomic } from '../persistence/atomicWrite';
import { parseHistoryEntry } from './iterationDocument';
import { logger } from '../logging/Logger';

/**
 * Append-only JSON-lines log of weight snapshots, one line per completed iteration
 */
export class FileWeightHistoryRepository implements IWeightHistoryRepository {
  private entries: WeightHistoryEntry[] | null = null;
  // set while the file may hold bytes of a failed append
  private dirty = false;

  constructor(private readonly historyPath: string) {}

  async append(entry: WeightHistoryEntry): Promise<void> {
    const entries = await this.load();

    if (entries.some(existing => existing.iterationIndex === entry.iterationIndex)) {
      throw new DuplicateIterationError(entry.iterationIndex);
    }
    const latest = entries.length > 0 ? entries[entries.length - 1].iterationIndex : 0;
    if (entry.iterationIndex <= latest) {
      throw new IterationStateError(
        `Weight history index ${entry.iterationIndex} does not follow ${latest}`,
        { iterationIndex: entry.iterationIndex, latest }
      );
    }

    if (this.dirty) {
      await this.rewrite(entries);
      this.dirty = false;
    }

    try {
      await fs.mkdir(path.dirname(this.historyPath), { recursive: true });
      await fs.appendFile(this.historyPath, JSON.stringify(entry) + '\n', 'utf8');
    } catch (error) {
      this.dirty = true;
      await this.restore(entries);
      throw new PersistenceWriteError('weight history', error);
    }

    entries.push(entry);
  }

  async list(): Promise<WeightHistoryEntry[]> {
    return [...(await this.load())];
  }

  async findByIndex(iterationIndex: number): Promise<WeightHistoryEntry | null> {
    const entries = await this.load();
    return entries.find(entry => entry.iterationIndex === iterationIndex) || null;
  }

  async latestIndex(): Promise<number> {
    const entries = await this.load();
    return entries.length > 0 ? entries[entries.length - 1].iterationIndex : 0;
  }

  private async load(): Promise<WeightHistoryEntry[]> {
    if (this.entries) {
      return this.entries;
    }

    const content = await readFileIfExists(this.historyPath);
    const lines = content === null ? [] : content.split('\n').filter(line => line.trim() !== '');
    const entries: WeightHistoryEntry[] = [];

    for (let i = 0; i < lines.length; i++) {
      const entry = this.parseLine(lines[i]);
      if (entry) {
        entries.push(entry);
        continue;
      }
      if (i === lines.length - 1) {
        // torn final append from an interrupted write
        logger.warn('Dropping incomplete last line of weight history', { path: this.historyPath });
        await this.rewrite(entries);
        break;
      }
      throw new ConfigError(`Corrupt weight history at line ${i + 1}`, { path: this.historyPath });
    }

    this.entries = entries;
    return entries;
  }

  private parseLine(line: string): WeightHistoryEntry | null {
    try {
      return parseHistoryEntry(JSON.parse(line));
    } catch (error) {
      logger.debug('Unparsable weight history line', {
        error: error instanceof Error ? error.message : String(error)
      });
      return null;
    }
  }

  /**
   * Puts the file back to the committed entries after a failed append. When that fails too,
   * the next append rewrites the file before writing its own line.
   */
  private async restore(entries: WeightHistoryEntry[]): Promise<void> {
    try {
      await this.rewrite(entries);
      this.dirty = false;
    } catch (error) {
      logger.error('Could not restore weight history after a failed append', {
        path: this.historyPath,
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  private async rewrite(entries: WeightHistoryEntry[]): Promise<void> {
    try {
      await writeFileAtomic(this.historyPath, entries.map(entry => JSON.stringify(entry) + '\n').join(''));
    } catch (error) {
      throw new PersistenceWriteError('weight history', error);
    }
  }
}
