import { promises as fs } from 'fs';
import path from 'path';
import { IIterationRepository } from '../../domain/repositories/IIterationRepository';
import { IterationRecord, IterationStatus } from '../../domain/entities/IterationRecord';
import { ConfigError, PersistenceWriteError } from '../../domain/errors/CouncilErrors';
import { isNotFound, readFileIfExists, writeFileAtomic } from '../persistence/atomicWrite';
import { fromIterationDocument, toIterationDocument } from './iterationDocument';

const FILE_PATTERN = /^iteration-(\d+)\.json$/;

/**
 * One JSON file per iteration, replaced atomically when the record changes
 */
export class FileIterationRepository implements IIterationRepository {
  constructor(private readonly directory: string) {}

  async save(record: IterationRecord): Promise<void> {
    try {
      await writeFileAtomic(
        this.pathFor(record.iterationIndex),
        JSON.stringify(toIterationDocument(record), null, 2) + '\n'
      );
    } catch (error) {
      throw new PersistenceWriteError(`iteration record ${record.iterationIndex}`, error);
    }
  }

  async findByIndex(iterationIndex: number): Promise<IterationRecord | null> {
    const filePath = this.pathFor(iterationIndex);
    const content = await readFileIfExists(filePath);
    if (content === null) {
      return null;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Iteration record ${filePath} is not valid JSON`, {
        error: error instanceof Error ? error.message : String(error)
      });
    }
    return fromIterationDocument(raw, filePath);
  }

  /**
   * Only the latest iteration can be pending, since a new one never starts while one waits
   */
  async findPending(): Promise<IterationRecord | null> {
    const latest = await this.latestIndex();
    if (latest === 0) {
      return null;
    }
    const record = await this.findByIndex(latest);
    return record && record.status === IterationStatus.AWAITING_OUTCOME ? record : null;
  }

  async latestIndex(): Promise<number> {
    let names: string[];
    try {
      names = await fs.readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) {
        return 0;
      }
      throw error;
    }

    return names.reduce((latest, name) => {
      const match = FILE_PATTERN.exec(name);
      return match ? Math.max(latest, Number(match[1])) : latest;
    }, 0);
  }

  private pathFor(iterationIndex: number): string {
    return path.join(this.directory, `iteration-${String(iterationIndex).padStart(6, '0')}.json`);
  }
}
