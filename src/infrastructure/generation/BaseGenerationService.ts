import { injectable } from 'inversify';
import { Agent } from '../../domain/entities/Agent';
import { CampaignContext } from '../../domain/entities/CampaignContext';
import { Proposal } from '../../domain/entities/Proposal';
import { IGenerationService } from '../../domain/services/IGenerationService';
import { GenerationFailure } from '../../domain/errors/CouncilErrors';
import { logger } from '../logging/Logger';

export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  temperature: number;
  maxTokens: number;
}

const MAX_PROMPT_TRENDS = 5;

/**
 * Prompt building and response parsing shared by the model-backed generators.
 * Subclasses only send one completion request and return its text.
 */
@injectable()
export abstract class BaseGenerationService implements IGenerationService {
  abstract readonly providerName: string;

  protected abstract complete(request: CompletionRequest): Promise<string>;

  async generateProposals(agent: Agent, context: CampaignContext, count: number): Promise<unknown[]> {
    const text = await this.request(agent, {
      systemPrompt: this.buildSystemPrompt(agent),
      userPrompt: this.buildProposalPrompt(context, count),
      temperature: 0.8,
      maxTokens: 800
    });

    const parsed = this.extractJson(text, agent.id);
    if (Array.isArray(parsed)) {
      return parsed;
    }
    if (isRecord(parsed) && Array.isArray(parsed.proposals)) {
      return parsed.proposals;
    }
    throw new GenerationFailure(`${this.providerName} returned no proposal list`, agent.id);
  }

  async generateCritique(critic: Agent, proposal: Proposal, context: CampaignContext): Promise<unknown> {
    const text = await this.request(critic, {
      systemPrompt: this.buildSystemPrompt(critic),
      userPrompt: this.buildCritiquePrompt(proposal, context),
      temperature: 0.7,
      maxTokens: 400
    });
    return this.extractJson(text, critic.id);
  }

  protected buildSystemPrompt(agent: Agent): string {
    return `You are ${agent.name}, a member of a marketing council.

ROLE: ${agent.role}

PERSONALITY: ${agent.personality}

YOUR GOALS:
${agent.goals.map(goal => `- ${goal}`).join('\n')}

Advocate for your perspective, be specific and stay in character.
Always answer with JSON only.`;
  }

  protected buildProposalPrompt(context: CampaignContext, count: number): string {
    const trends = (context.trends || []).slice(0, MAX_PROMPT_TRENDS);
    return `BRAND CONTEXT:
Brand: ${context.brandName}
Industry: ${context.industry}
Target Audience: ${context.targetAudience}

PRODUCT/CAMPAIGN:
${context.productInfo}

TRENDING TOPICS:
${trends.length > 0 ? trends.map(trend => `- ${trend}`).join('\n') : '- none'}

Propose ${count} social media post ideas. Return JSON:
{
  "proposals": [
    { "platform": "twitter | instagram | linkedin", "approach": "content approach", "reasoning": "why it serves your goals", "score": 1-10 }
  ]
}`;
  }

  protected buildCritiquePrompt(proposal: Proposal, context: CampaignContext): string {
    return `BRAND CONTEXT:
Brand: ${context.brandName}
Product: ${context.productInfo}

PROPOSAL FROM ${proposal.agentId.toUpperCase()}:
Platform: ${proposal.platform}
Approach: ${proposal.approach}
Reasoning: ${proposal.reasoning}

Critique this proposal from your perspective. Pick the single most important concern. Return JSON:
{ "category": "goal_conflict | risk | missed_opportunity", "detail": "specific objection" }`;
  }

  /**
   * Parses a JSON payload, tolerating markdown code fences around it
   */
  protected extractJson(text: string, agentId: string): unknown {
    let content = text.trim();
    const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/);
    if (fenced) {
      content = fenced[1].trim();
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      logger.warn(`Failed to parse ${this.providerName} response as JSON`, {
        agentId,
        error: error instanceof Error ? error.message : 'Unknown parse error'
      });
      throw new GenerationFailure(`${this.providerName} returned malformed JSON`, agentId, error);
    }
  }

  private async request(agent: Agent, request: CompletionRequest): Promise<string> {
    try {
      logger.debug(`Calling ${this.providerName}`, { agentId: agent.id, maxTokens: request.maxTokens });
      return await this.complete(request);
    } catch (error) {
      logger.error(`${this.providerName} call failed`, {
        agentId: agent.id,
        error: error instanceof Error ? error.message : 'Unknown error'
      });
      throw new GenerationFailure(`${this.providerName} call failed`, agent.id, error);
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
