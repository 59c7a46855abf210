import { BaseGenerationService, CompletionRequest } from '../../infrastructure/generation/BaseGenerationService';
import { MockGenerationService } from '../../infrastructure/generation/MockGenerationService';
import { OpenAIGenerationService } from '../../infrastructure/generation/OpenAIGenerationService';
import { ClaudeGenerationService } from '../../infrastructure/generation/ClaudeGenerationService';
import { GeminiGenerationService } from '../../infrastructure/generation/GeminiGenerationService';
import { proposalRecordSchema, validateRecord } from '../../infrastructure/council/recordSchemas';
import { Proposal } from '../../domain/entities/Proposal';
import { ConfigError, GenerationFailure } from '../../domain/errors/CouncilErrors';
import { makeAgent, sampleContext, testConfig } from '../helpers/councilFixtures';

class CannedGenerationService extends BaseGenerationService {
  readonly providerName = 'canned';
  readonly requests: CompletionRequest[] = [];

  constructor(private reply: string | Error) {
    super();
  }

  protected async complete(request: CompletionRequest): Promise<string> {
    this.requests.push(request);
    if (this.reply instanceof Error) {
      throw this.reply;
    }
    return this.reply;
  }
}

const proposal = new Proposal('1:viral:0', 'viral', 'twitter', 'Bold Technology challenge featuring Acme', 'reach', 9);

describe('BaseGenerationService', () => {
  const agent = makeAgent('viral', 1, ['Maximize viral reach']);

  it('should accept a bare proposal array', async () => {
    const service = new CannedGenerationService('[{"platform":"twitter","approach":"Poll","score":6}]');

    await expect(service.generateProposals(agent, sampleContext, 2)).resolves.toEqual([
      { platform: 'twitter', approach: 'Poll', score: 6 }
    ]);
  });

  it('should unwrap a fenced proposals object', async () => {
    const service = new CannedGenerationService('Here you go:\n```json\n{"proposals":[{"platform":"linkedin"}]}\n```');

    await expect(service.generateProposals(agent, sampleContext, 1)).resolves.toEqual([{ platform: 'linkedin' }]);
  });

  it('should fail on replies without a proposal list', async () => {
    const service = new CannedGenerationService('{"idea":"none"}');

    await expect(service.generateProposals(agent, sampleContext, 1)).rejects.toThrow('canned returned no proposal list');
  });

  it('should fail on malformed JSON', async () => {
    const service = new CannedGenerationService('not json at all');

    await expect(service.generateCritique(agent, proposal, sampleContext)).rejects.toThrow(
      'canned returned malformed JSON'
    );
  });

  it('should wrap backend errors as generation failures', async () => {
    const service = new CannedGenerationService(new Error('429 Too Many Requests'));

    const failure = service.generateCritique(agent, proposal, sampleContext);

    await expect(failure).rejects.toBeInstanceOf(GenerationFailure);
    await expect(failure).rejects.toMatchObject({ agentId: 'viral', details: { cause: '429 Too Many Requests' } });
  });

  it('should put the agent persona and at most five trends in the prompts', async () => {
    const service = new CannedGenerationService('[]');
    const context = { ...sampleContext, trends: ['t1', 't2', 't3', 't4', 't5', 't6'] };

    await service.generateProposals(agent, context, 2);

    const [request] = service.requests;
    expect(request.systemPrompt).toContain('- Maximize viral reach');
    expect(request.userPrompt).toContain('- t5');
    expect(request.userPrompt).not.toContain('- t6');
    expect(request.userPrompt).toContain('Propose 2 social media post ideas.');
    expect(request.temperature).toBe(0.8);
  });
});

describe('model-backed generation services', () => {
  it('should require their API keys', () => {
    expect(() => new OpenAIGenerationService(testConfig())).toThrow(ConfigError);
    expect(() => new ClaudeGenerationService(testConfig())).toThrow(ConfigError);
    expect(() => new GeminiGenerationService(testConfig())).toThrow(ConfigError);
  });
});

describe('MockGenerationService', () => {
  const service = new MockGenerationService();
  const viral = makeAgent('viral', 1, ['Maximize viral reach']);
  const guardian = makeAgent('guardian', 1, ['Protect brand reputation']);
  const platform = makeAgent('platform', 1, ['Win on linkedin']);

  it('should produce valid proposals shaped by the agent goals', async () => {
    const records = await service.generateProposals(viral, sampleContext, 3);

    expect(records).toHaveLength(3);
    expect(records.every(record => validateRecord(proposalRecordSchema, record).ok)).toBe(true);
    expect(records).toMatchObject([
      { approach: 'Bold Technology challenge featuring Acme', score: 9 },
      { approach: 'Reactive meme series tying Task planner to Technology', score: 8 },
      { approach: 'Bold Technology challenge featuring Acme', score: 8 }
    ]);
  });

  it('should name the platform a specialist prefers', async () => {
    const [record] = await service.generateProposals(platform, sampleContext, 1);

    expect(record).toMatchObject({ platform: 'linkedin', approach: 'Native linkedin thread breaking down Task planner' });
  });

  it('should flag bold proposals as risks for a cautious critic', async () => {
    await expect(service.generateCritique(guardian, proposal, sampleContext)).resolves.toEqual({
      category: 'risk',
      detail: '"Bold Technology challenge featuring Acme" could put Acme\'s reputation at risk'
    });
  });

  it('should flag off-platform proposals as goal conflicts for a specialist', async () => {
    await expect(service.generateCritique(platform, proposal, sampleContext)).resolves.toEqual({
      category: 'goal_conflict',
      detail: 'Ignores linkedin, where Students are most active'
    });
  });

  it('should otherwise point out a missed opportunity', async () => {
    const quiet = new Proposal('1:guardian:0', 'guardian', 'instagram', 'Customer story', 'trust', 6);

    await expect(service.generateCritique(viral, quiet, sampleContext)).resolves.toEqual({
      category: 'missed_opportunity',
      detail: 'Plays it safe and will not spread beyond existing followers'
    });
  });
});
