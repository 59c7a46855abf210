import { injectable, inject } from 'inversify';
import { FinishReason, GoogleGenerativeAI } from '@google/generative-ai';
import { BaseGenerationService, CompletionRequest } from './BaseGenerationService';
import { CouncilConfig } from '../../config/councilConfig';
import { ConfigError } from '../../domain/errors/CouncilErrors';
import { logger } from '../logging/Logger';

@injectable()
export class GeminiGenerationService extends BaseGenerationService {
  readonly providerName = 'gemini';
  private gemini: GoogleGenerativeAI;
  private model: string;

  constructor(@inject('CouncilConfig') config: CouncilConfig) {
    super();
    if (!config.apiKeys.google) {
      throw new ConfigError('Google API key is required');
    }
    this.gemini = new GoogleGenerativeAI(config.apiKeys.google);
    this.model = config.models.gemini;
  }

  protected async complete(request: CompletionRequest): Promise<string> {
    const model = this.gemini.getGenerativeModel({ model: this.model });

    // Gemini takes no separate system message here
    const result = await model.generateContent({
      contents: [{ role: 'user', parts: [{ text: `${request.systemPrompt}\n\n${request.userPrompt}` }] }],
      generationConfig: {
        temperature: request.temperature,
        maxOutputTokens: request.maxTokens
      }
    });

    const response = result.response;
    if (response.candidates?.[0]?.finishReason === FinishReason.MAX_TOKENS) {
      logger.warn('Gemini response truncated due to token limit');
    }
    return response.text();
  }
}
