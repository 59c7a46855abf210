import { injectable, inject } from 'inversify';
import Anthropic from '@anthropic-ai/sdk';
import { BaseGenerationService, CompletionRequest } from './BaseGenerationService';
import { CouncilConfig } from '../../config/councilConfig';
import { ConfigError } from '../../domain/errors/CouncilErrors';

@injectable()
export class ClaudeGenerationService extends BaseGenerationService {
  readonly providerName = 'claude';
  private claude: Anthropic;
  private model: string;

  constructor(@inject('CouncilConfig') config: CouncilConfig) {
    super();
    if (!config.apiKeys.anthropic) {
      throw new ConfigError('Anthropic API key is required');
    }
    this.claude = new Anthropic({ apiKey: config.apiKeys.anthropic });
    this.model = config.models.claude;
  }

  protected async complete(request: CompletionRequest): Promise<string> {
    const message = await this.claude.messages.create({
      model: this.model,
      max_tokens: request.maxTokens,
      temperature: request.temperature,
      system: request.systemPrompt,
      messages: [{ role: 'user', content: request.userPrompt }]
    });

    return message.content
      .map(block => (block.type === 'text' ? block.text : ''))
      .join('');
  }
}
