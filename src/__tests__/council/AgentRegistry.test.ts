import { AgentRegistry } from '../../infrastructure/council/AgentRegistry';
import { InMemoryAgentStateRepository } from '../../infrastructure/repositories/InMemoryCouncilRepositories';
import { ConfigError, UnknownAgentError } from '../../domain/errors/CouncilErrors';
import { rosterDocument, testConfig } from '../helpers/councilFixtures';

function repositoryOf(document: unknown): InMemoryAgentStateRepository {
  return new InMemoryAgentStateRepository(async () => document);
}

describe('AgentRegistry', () => {
  let registry: AgentRegistry;

  beforeEach(() => {
    registry = new AgentRegistry(testConfig());
  });

  it('should load agents in roster order with their weights', async () => {
    const agents = await registry.load(repositoryOf(rosterDocument([{ id: 'viral', weight: 1.4 }, { id: 'guardian', weight: 0.8 }], 3)));

    expect(agents.map(agent => agent.id)).toEqual(['viral', 'guardian']);
    expect(registry.ids()).toEqual(['viral', 'guardian']);
    expect(registry.getWeight('guardian')).toBe(0.8);
    expect(registry.getAppliedIteration()).toBe(3);
    expect(registry.getAgent('viral').wins).toBe(0);
  });

  it('should raise a stored weight below the floor', async () => {
    await registry.load(repositoryOf(rosterDocument([{ id: 'viral', weight: 0.02 }])));
    expect(registry.getWeight('viral')).toBe(0.1);
  });

  it('should reject an empty roster', async () => {
    await expect(registry.load(repositoryOf({ agents: [] }))).rejects.toBeInstanceOf(ConfigError);
    expect(registry.isLoaded()).toBe(false);
  });

  it('should reject duplicate agent ids', async () => {
    const document = rosterDocument([{ id: 'viral', weight: 1 }, { id: 'viral', weight: 1 }]);
    await expect(registry.load(repositoryOf(document))).rejects.toThrow('Two agents share the same id');
  });

  it('should reject an agent without a weight', async () => {
    await expect(registry.load(repositoryOf({ agents: [{ id: 'viral' }] }))).rejects.toThrow(
      'Agent entry is missing a weight'
    );
  });

  it('should refuse reads before loading', () => {
    expect(() => registry.list()).toThrow(ConfigError);
  });

  it('should raise UnknownAgentError for ids outside the roster', async () => {
    await registry.load(repositoryOf(rosterDocument([{ id: 'viral', weight: 1 }])));
    expect(() => registry.getWeight('ghost')).toThrow(UnknownAgentError);
  });

  it('should clamp weights set in memory', async () => {
    await registry.load(repositoryOf(rosterDocument([{ id: 'viral', weight: 1 }])));

    expect(registry.setWeight('viral', 0.01)).toBe(0.1);
    expect(registry.snapshot()).toEqual({ viral: 0.1 });
  });

  it('should return a snapshot detached from the registry', async () => {
    await registry.load(repositoryOf(rosterDocument([{ id: 'viral', weight: 1 }])));

    const snapshot = registry.snapshot();
    snapshot.viral = 5;
    expect(registry.getWeight('viral')).toBe(1);
  });

  it('should keep the agent set fixed across reloads', async () => {
    await registry.load(repositoryOf(rosterDocument([{ id: 'viral', weight: 1 }])));

    await expect(registry.load(repositoryOf(rosterDocument([{ id: 'guardian', weight: 1 }])))).rejects.toThrow(
      'Agent ids cannot change for a loaded registry'
    );
    expect(registry.ids()).toEqual(['viral']);
  });

  describe('commit', () => {
    let state: InMemoryAgentStateRepository;

    beforeEach(async () => {
      state = repositoryOf(rosterDocument([{ id: 'viral', weight: 1 }, { id: 'guardian', weight: 1 }]));
      await registry.load(state);
    });

    it('should persist then swap weights and counters', async () => {
      await expect(registry.commit({ viral: 1.2, guardian: 1 }, 'viral', 1, state)).resolves.toBe(true);

      expect(registry.snapshot()).toEqual({ viral: 1.2, guardian: 1 });
      expect(registry.getAgent('viral').wins).toBe(1);
      expect(registry.getAgent('guardian').losses).toBe(1);

      const reloaded = new AgentRegistry(testConfig());
      await reloaded.load(state);
      expect(reloaded.snapshot()).toEqual({ viral: 1.2, guardian: 1 });
      expect(reloaded.getAppliedIteration()).toBe(1);
    });

    it('should skip an iteration that is already applied', async () => {
      await registry.commit({ viral: 1.2, guardian: 1 }, 'viral', 1, state);

      await expect(registry.commit({ viral: 1.4, guardian: 1 }, 'viral', 1, state)).resolves.toBe(false);
      expect(registry.getWeight('viral')).toBe(1.2);
      expect(registry.getAgent('viral').wins).toBe(1);
    });

    it('should reject weights for agents outside the roster', async () => {
      await expect(registry.commit({ viral: 1, guardian: 1, ghost: 1 }, 'viral', 1, state)).rejects.toBeInstanceOf(
        UnknownAgentError
      );
      await expect(registry.commit({ viral: 1 }, 'viral', 1, state)).rejects.toBeInstanceOf(UnknownAgentError);
      expect(registry.getAppliedIteration()).toBe(0);
    });
  });
});
