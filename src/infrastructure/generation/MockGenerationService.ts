import { injectable } from 'inversify';
import { Agent } from '../../domain/entities/Agent';
import { CampaignContext } from '../../domain/entities/CampaignContext';
import { CritiqueCategory } from '../../domain/entities/Critique';
import { Proposal } from '../../domain/entities/Proposal';
import { IGenerationService } from '../../domain/services/IGenerationService';

type Leaning = 'reach' | 'safety' | 'platform' | 'general';

const PLATFORMS = ['twitter', 'instagram', 'linkedin'];
const BOLD_WORDS = ['bold', 'viral', 'trend', 'challenge', 'meme', 'controversial'];

/**
 * Offline generator. Output depends only on the agent's goals and the inputs, so runs
 * are reproducible without any model backend.
 */
@injectable()
export class MockGenerationService implements IGenerationService {
  readonly providerName = 'mock';

  async generateProposals(agent: Agent, context: CampaignContext, count: number): Promise<unknown[]> {
    const leaning = leaningOf(agent);
    const platform = preferredPlatform(agent);
    const trend = (context.trends || [])[0];
    const topic = trend ? trend.split(' (Source:')[0] : context.industry;

    const ideas: Array<{ approach: string; score: number }> = [];
    switch (leaning) {
      case 'reach':
        ideas.push(
          { approach: `Bold ${topic} challenge featuring ${context.brandName}`, score: 9 },
          { approach: `Reactive meme series tying ${context.productInfo} to ${topic}`, score: 8 }
        );
        break;
      case 'safety':
        ideas.push(
          { approach: `Customer story showing how ${context.targetAudience} use ${context.productInfo}`, score: 7 },
          { approach: `Behind-the-scenes look at how ${context.brandName} builds ${context.productInfo}`, score: 6 }
        );
        break;
      case 'platform':
        ideas.push(
          { approach: `Native ${platform} thread breaking down ${context.productInfo}`, score: 8 },
          { approach: `${platform} poll asking ${context.targetAudience} about ${topic}`, score: 7 }
        );
        break;
      default:
        ideas.push(
          { approach: `Product highlight for ${context.brandName}`, score: 6 },
          { approach: `Tips for ${context.targetAudience} on ${topic}`, score: 5 }
        );
    }

    const proposals: unknown[] = [];
    for (let i = 0; i < count; i++) {
      const idea = ideas[i % ideas.length];
      proposals.push({
        platform,
        approach: idea.approach,
        reasoning: `Serves ${agent.name}'s goal: ${agent.goals[0] || agent.role}`,
        score: Math.max(1, idea.score - Math.floor(i / ideas.length))
      });
    }
    return proposals;
  }

  async generateCritique(critic: Agent, proposal: Proposal, context: CampaignContext): Promise<unknown> {
    const leaning = leaningOf(critic);
    const approach = proposal.approach.toLowerCase();

    if (leaning === 'safety' && BOLD_WORDS.some(word => approach.includes(word))) {
      return {
        category: CritiqueCategory.RISK,
        detail: `"${proposal.approach}" could put ${context.brandName}'s reputation at risk`
      };
    }

    if (leaning === 'platform') {
      const platform = preferredPlatform(critic);
      if (proposal.platform !== platform) {
        return {
          category: CritiqueCategory.GOAL_CONFLICT,
          detail: `Ignores ${platform}, where ${context.targetAudience} are most active`
        };
      }
    }

    return {
      category: CritiqueCategory.MISSED_OPPORTUNITY,
      detail: leaning === 'reach'
        ? 'Plays it safe and will not spread beyond existing followers'
        : `Does not connect ${context.productInfo} to a clear call to action`
    };
  }
}

function leaningOf(agent: Agent): Leaning {
  const text = agent.goals.join(' ').toLowerCase();
  if (PLATFORMS.some(platform => text.includes(platform))) {
    return 'platform';
  }
  if (/viral|reach|engagement|trend/.test(text)) {
    return 'reach';
  }
  if (/brand|safe|reputation|consisten/.test(text)) {
    return 'safety';
  }
  return 'general';
}

function preferredPlatform(agent: Agent): string {
  const text = `${agent.goals.join(' ')} ${agent.role}`.toLowerCase();
  const named = PLATFORMS.find(platform => text.includes(platform));
  if (named) {
    return named;
  }
  let hash = 0;
  for (const char of agent.id) {
    hash = (hash * 31 + char.charCodeAt(0)) % 1000;
  }
  return PLATFORMS[hash % PLATFORMS.length];
}
