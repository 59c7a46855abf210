import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { FileAgentStateRepository } from '../../infrastructure/repositories/FileAgentStateRepository';
import { FileWeightHistoryRepository } from '../../infrastructure/repositories/FileWeightHistoryRepository';
import { FileIterationRepository } from '../../infrastructure/repositories/FileIterationRepository';
import { IterationStatus } from '../../domain/entities/IterationRecord';
import { Proposal } from '../../domain/entities/Proposal';
import { WeightHistoryEntry } from '../../domain/valueObjects/WeightHistoryEntry';
import {
  ConfigError,
  DuplicateIterationError,
  IterationStateError,
  PersistenceWriteError
} from '../../domain/errors/CouncilErrors';
import { isNotFound, readFileIfExists } from '../../infrastructure/persistence/atomicWrite';
import { makeRecord, rosterDocument } from '../helpers/councilFixtures';

function entry(iterationIndex: number, weights: Record<string, number> = { viral: 1, guardian: 1 }): WeightHistoryEntry {
  return {
    iterationIndex,
    timestamp: '2026-01-01T00:00:00.000Z',
    weights,
    winnerId: 'viral',
    outcomeScore: 8
  };
}

describe('file repositories', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'council-store-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('readFileIfExists', () => {
    it('should resolve null for a missing file', async () => {
      await expect(readFileIfExists(path.join(dir, 'missing.json'))).resolves.toBeNull();
    });

    it('should recognise a missing file by its code alone', () => {
      expect(isNotFound({ code: 'ENOENT' })).toBe(true);
      expect(isNotFound({ code: 'EACCES' })).toBe(false);
      expect(isNotFound('ENOENT')).toBe(false);
      expect(isNotFound(null)).toBe(false);
    });
  });

  describe('FileAgentStateRepository', () => {
    it('should read the seed roster until state is saved', async () => {
      const seedPath = path.join(dir, 'agents.json');
      const statePath = path.join(dir, 'state', 'agents.json');
      await fs.writeFile(seedPath, JSON.stringify(rosterDocument([{ id: 'viral', weight: 1 }])), 'utf8');
      const repository = new FileAgentStateRepository(statePath, seedPath);

      await expect(repository.load()).resolves.toMatchObject({ agents: [{ id: 'viral', weight: 1 }] });

      await repository.save({
        appliedIteration: 2,
        agents: [{ id: 'viral', name: 'viral', role: '', personality: '', goals: [], weight: 1.4, wins: 2, losses: 0 }]
      });

      await expect(repository.load()).resolves.toMatchObject({ appliedIteration: 2, agents: [{ weight: 1.4 }] });
      const seed = JSON.parse(await fs.readFile(seedPath, 'utf8'));
      expect(seed.agents[0].weight).toBe(1);
    });

    it('should fail when neither state nor seed exists', async () => {
      const repository = new FileAgentStateRepository(path.join(dir, 'state.json'), path.join(dir, 'missing.json'));

      await expect(repository.load()).rejects.toBeInstanceOf(ConfigError);
    });

    it('should reject a roster that is not JSON', async () => {
      const seedPath = path.join(dir, 'agents.json');
      await fs.writeFile(seedPath, '{ agents: ', 'utf8');

      await expect(new FileAgentStateRepository(path.join(dir, 'state.json'), seedPath).load()).rejects.toThrow(
        `Agent roster at ${seedPath} is not valid JSON`
      );
    });
  });

  describe('FileWeightHistoryRepository', () => {
    it('should append one line per entry and read them back in order', async () => {
      const historyPath = path.join(dir, 'history', 'weights.jsonl');
      const repository = new FileWeightHistoryRepository(historyPath);

      await repository.append(entry(1, { viral: 1.2, guardian: 1 }));
      await repository.append(entry(2, { viral: 1.2, guardian: 0.9 }));

      const lines = (await fs.readFile(historyPath, 'utf8')).trim().split('\n');
      expect(lines).toHaveLength(2);

      const reopened = new FileWeightHistoryRepository(historyPath);
      await expect(reopened.latestIndex()).resolves.toBe(2);
      await expect(reopened.findByIndex(2)).resolves.toEqual(entry(2, { viral: 1.2, guardian: 0.9 }));
    });

    it('should refuse duplicates and out-of-order indexes', async () => {
      const repository = new FileWeightHistoryRepository(path.join(dir, 'weights.jsonl'));
      await repository.append(entry(1));
      await repository.append(entry(3));

      await expect(repository.append(entry(3))).rejects.toBeInstanceOf(DuplicateIterationError);
      await expect(repository.append(entry(2))).rejects.toBeInstanceOf(IterationStateError);
      await expect(repository.list()).resolves.toHaveLength(2);
    });

    it('should drop a torn final line', async () => {
      const historyPath = path.join(dir, 'weights.jsonl');
      await fs.writeFile(historyPath, JSON.stringify(entry(1)) + '\n{"iterationIndex": 2, "weig', 'utf8');

      const repository = new FileWeightHistoryRepository(historyPath);

      await expect(repository.latestIndex()).resolves.toBe(1);
      expect(await fs.readFile(historyPath, 'utf8')).toBe(JSON.stringify(entry(1)) + '\n');
    });

    describe('after an append fails partway', () => {
      const realAppend = fs.appendFile.bind(fs);

      function failAppendAfter(bytes: number) {
        return jest.spyOn(fs, 'appendFile').mockImplementationOnce(async (file, data) => {
          await realAppend(file, typeof data === 'string' ? data.slice(0, bytes) : data.subarray(0, bytes));
          throw Object.assign(new Error('no space left on device'), { code: 'ENOSPC' });
        });
      }

      it('should restore the file so a retried entry survives a reload', async () => {
        const historyPath = path.join(dir, 'weights.jsonl');
        const repository = new FileWeightHistoryRepository(historyPath);
        await repository.append(entry(1));

        failAppendAfter(20);
        await expect(repository.append(entry(2))).rejects.toBeInstanceOf(PersistenceWriteError);
        expect(await fs.readFile(historyPath, 'utf8')).toBe(JSON.stringify(entry(1)) + '\n');

        await repository.append(entry(2));

        const reloaded = await new FileWeightHistoryRepository(historyPath).list();
        expect(reloaded.map(e => e.iterationIndex)).toEqual([1, 2]);
      });

      it('should rewrite the file before the next append when the restore failed too', async () => {
        const historyPath = path.join(dir, 'weights.jsonl');
        const repository = new FileWeightHistoryRepository(historyPath);
        await repository.append(entry(1));

        failAppendAfter(20);
        jest.spyOn(fs, 'writeFile').mockRejectedValueOnce(new Error('read-only file system'));
        await expect(repository.append(entry(2))).rejects.toBeInstanceOf(PersistenceWriteError);
        expect(await fs.readFile(historyPath, 'utf8')).toBe(
          JSON.stringify(entry(1)) + '\n' + JSON.stringify(entry(2)).slice(0, 20)
        );

        await repository.append(entry(2));
        await repository.append(entry(3));

        expect(await fs.readFile(historyPath, 'utf8')).toBe(
          [entry(1), entry(2), entry(3)].map(e => JSON.stringify(e) + '\n').join('')
        );
        const reloaded = await new FileWeightHistoryRepository(historyPath).list();
        expect(reloaded.map(e => e.iterationIndex)).toEqual([1, 2, 3]);
      });
    });

    it('should refuse a history corrupted before its last line', async () => {
      const historyPath = path.join(dir, 'weights.jsonl');
      await fs.writeFile(historyPath, 'garbage\n' + JSON.stringify(entry(1)) + '\n', 'utf8');

      await expect(new FileWeightHistoryRepository(historyPath).list()).rejects.toThrow(
        'Corrupt weight history at line 1'
      );
    });
  });

  describe('FileIterationRepository', () => {
    it('should store and restore a record with its entities', async () => {
      const repository = new FileIterationRepository(path.join(dir, 'iterations'));
      const record = makeRecord({ iterationIndex: 2 });

      await repository.save(record);
      const restored = await repository.findByIndex(2);

      expect(restored?.proposals[0]).toBeInstanceOf(Proposal);
      expect(restored?.decision).toEqual(record.decision);
      expect(restored?.critiques.map(c => c.category)).toEqual(['risk', 'missed_opportunity']);
      await expect(fs.readdir(path.join(dir, 'iterations'))).resolves.toEqual(['iteration-000002.json']);
    });

    it('should report only the latest record as pending', async () => {
      const repository = new FileIterationRepository(path.join(dir, 'iterations'));

      await expect(repository.findPending()).resolves.toBeNull();
      await expect(repository.latestIndex()).resolves.toBe(0);

      await repository.save(makeRecord({ iterationIndex: 1, status: IterationStatus.COMPLETED }));
      await repository.save(makeRecord({ iterationIndex: 2 }));

      const pending = await repository.findPending();
      expect(pending?.iterationIndex).toBe(2);

      await repository.save(makeRecord({ iterationIndex: 2, status: IterationStatus.COMPLETED }));
      await expect(repository.findPending()).resolves.toBeNull();
    });

    it('should return null for an iteration never stored', async () => {
      const repository = new FileIterationRepository(dir);

      await expect(repository.findByIndex(9)).resolves.toBeNull();
    });
  });
});
