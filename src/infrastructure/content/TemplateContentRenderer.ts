import { injectable } from 'inversify';
import { CampaignContext } from '../../domain/entities/CampaignContext';
import { Decision } from '../../domain/entities/Decision';
import { IContentRenderer } from '../../domain/services/IContentRenderer';
import { RenderedContent, SupportedPlatform } from '../../domain/valueObjects/RenderedContent';

interface PlatformSpec {
  charLimit: number;
  hashtagCount: number;
  postingTime: string;
}

export const PLATFORM_SPECS: Record<SupportedPlatform, PlatformSpec> = {
  twitter: { charLimit: 280, hashtagCount: 2, postingTime: '9:00 AM EST' },
  instagram: { charLimit: 2200, hashtagCount: 8, postingTime: '11:00 AM EST' },
  linkedin: { charLimit: 3000, hashtagCount: 4, postingTime: '8:00 AM EST' }
};

const FALLBACK_HASHTAGS = ['Marketing', 'Growth', 'Innovation', 'Community', 'Launch', 'Brand', 'Social', 'Trending'];

export function normalizePlatform(platform: string): SupportedPlatform {
  const value = platform.trim().toLowerCase();
  if (value === 'instagram' || value === 'linkedin') {
    return value;
  }
  // 'x', 'generic' and anything unknown post with twitter's limits
  return 'twitter';
}

export function toHashtag(text: string): string | null {
  const words = text.split(/[^A-Za-z0-9]+/).filter(word => word.length > 0);
  if (words.length === 0) {
    return null;
  }
  return '#' + words.map(word => word.charAt(0).toUpperCase() + word.slice(1)).join('');
}

/**
 * Deterministic post layout for the winning proposal. Runs after arbitration and never
 * feeds anything back into the council.
 */
@injectable()
export class TemplateContentRenderer implements IContentRenderer {
  render(decision: Decision, context: CampaignContext): RenderedContent {
    const platform = normalizePlatform(decision.platform);
    const spec = PLATFORM_SPECS[platform];

    const hashtags = this.pickHashtags(context, spec.hashtagCount);
    const tagLine = hashtags.join(' ');

    let body = `${decision.approach}\n\nDiscover ${context.brandName}: ${context.productInfo}`;
    const maxBody = spec.charLimit - tagLine.length - 2;
    if (body.length > maxBody) {
      body = body.slice(0, Math.max(0, maxBody - 3)).trimEnd() + '...';
    }

    const caption = `${body}\n\n${tagLine}`;
    return {
      platform,
      caption,
      hashtags,
      postingTime: spec.postingTime,
      charCount: caption.length,
      imagePrompt: `${context.brandName} ${context.productInfo}, modern professional design, marketing photography`
    };
  }

  private pickHashtags(context: CampaignContext, count: number): string[] {
    const trendTopics = (context.trends || []).map(trend => trend.split(' (Source:')[0]);
    const candidates = [context.brandName, context.industry, ...trendTopics, ...FALLBACK_HASHTAGS];

    const seen = new Set<string>();
    const hashtags: string[] = [];
    for (const candidate of candidates) {
      if (hashtags.length >= count) {
        break;
      }
      const tag = toHashtag(candidate);
      if (!tag || seen.has(tag.toLowerCase())) {
        continue;
      }
      seen.add(tag.toLowerCase());
      hashtags.push(tag);
    }
    return hashtags;
  }
}
