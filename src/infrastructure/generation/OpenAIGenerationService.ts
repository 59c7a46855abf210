import { injectable, inject } from 'inversify';
import OpenAI from 'openai';
import { BaseGenerationService, CompletionRequest } from './BaseGenerationService';
import { CouncilConfig } from '../../config/councilConfig';
import { ConfigError } from '../../domain/errors/CouncilErrors';

@injectable()
export class OpenAIGenerationService extends BaseGenerationService {
  readonly providerName = 'openai';
  private openai: OpenAI;
  private model: string;

  constructor(@inject('CouncilConfig') config: CouncilConfig) {
    super();
    if (!config.apiKeys.openai) {
      throw new ConfigError('OpenAI API key is required');
    }
    this.openai = new OpenAI({ apiKey: config.apiKeys.openai });
    this.model = config.models.openai;
  }

  protected async complete(request: CompletionRequest): Promise<string> {
    const response = await this.openai.chat.completions.create({
      model: this.model,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt }
      ],
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      response_format: { type: 'json_object' }
    });

    return response.choices[0]?.message?.content || '';
  }
}
