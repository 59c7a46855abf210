import { AgentStateDocument, IAgentStateRepository } from '../../domain/repositories/IAgentStateRepository';
import { ConfigError, PersistenceWriteError } from '../../domain/errors/CouncilErrors';
import { readFileIfExists, writeFileAtomic } from '../persistence/atomicWrite';
import { logger } from '../logging/Logger';

/**
 * Agent roster snapshot on disk. Reads the learned state when present, otherwise the
 * configured seed roster; always writes the state file.
 */
export class FileAgentStateRepository implements IAgentStateRepository {
  constructor(
    private readonly statePath: string,
    private readonly seedPath: string
  ) {}

  async load(): Promise<unknown> {
    const state = await readFileIfExists(this.statePath);
    if (state !== null) {
      return parseRoster(state, this.statePath);
    }

    logger.info('No saved agent state, loading seed roster', { path: this.seedPath });
    return readRosterFile(this.seedPath);
  }

  async save(document: AgentStateDocument): Promise<void> {
    try {
      await writeFileAtomic(this.statePath, JSON.stringify(document, null, 2) + '\n');
    } catch (error) {
      throw new PersistenceWriteError('agent state', error);
    }
  }
}

/**
 * Reads a roster seed file such as config/agents.json
 */
export async function readRosterFile(filePath: string): Promise<unknown> {
  const content = await readFileIfExists(filePath);
  if (content === null) {
    throw new ConfigError(`Agent roster not found at ${filePath}`);
  }
  return parseRoster(content, filePath);
}

function parseRoster(content: string, source: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Agent roster at ${source} is not valid JSON`, {
      error: error instanceof Error ? error.message : String(error)
    });
  }
}
