import { injectable, inject } from 'inversify';
import Joi from 'joi';
import { ITrendService } from '../../domain/services/ITrendService';
import { ConfigError } from '../../domain/errors/CouncilErrors';
import { CouncilConfig } from '../../config/councilConfig';
import { readFileIfExists } from '../persistence/atomicWrite';
import { validateRecord } from '../council/recordSchemas';
import { logger } from '../logging/Logger';

export interface SampleTrend {
  topic: string;
  source: string;
  volume: string;
  relevance: number;
  tags: string[];
}

const sampleTrendsSchema = Joi.object<{ sample_trends: SampleTrend[] }>({
  sample_trends: Joi.array()
    .items(
      Joi.object({
        topic: Joi.string().trim().min(1).required(),
        source: Joi.string().trim().default('sample'),
        volume: Joi.string().trim().default('medium'),
        relevance: Joi.number().min(0).max(1).default(0.5),
        tags: Joi.array().items(Joi.string()).default([])
      }).unknown(true)
    )
    .required()
}).unknown(true);

export function formatTrend(trend: SampleTrend): string {
  return `${trend.topic} (Source: ${trend.source}, Volume: ${trend.volume})`;
}

/**
 * Trend source backed by a local sample file. Topics related to the hint come first,
 * then the rest by relevance.
 */
@injectable()
export class SampleTrendService implements ITrendService {
  private cache: SampleTrend[] | null = null;

  constructor(@inject('CouncilConfig') private config: CouncilConfig) {}

  async fetchTrends(industryHint: string, limit: number): Promise<string[]> {
    const trends = await this.loadTrends();
    const hintWords = industryHint.toLowerCase().split(/\W+/).filter(word => word.length > 2);

    const matches = (trend: SampleTrend): boolean => {
      const haystack = [trend.topic, ...trend.tags].join(' ').toLowerCase();
      return hintWords.some(word => haystack.includes(word));
    };

    const ranked = trends
      .map((trend, index) => ({ trend, index, related: matches(trend) }))
      .sort((a, b) =>
        Number(b.related) - Number(a.related) ||
        b.trend.relevance - a.trend.relevance ||
        a.index - b.index
      );

    const seen = new Set<string>();
    const result: string[] = [];
    for (const { trend } of ranked) {
      if (result.length >= limit) {
        break;
      }
      const key = trend.topic.toLowerCase();
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      result.push(formatTrend(trend));
    }

    logger.debug('Sample trends selected', { industryHint, count: result.length });
    return result;
  }

  private async loadTrends(): Promise<SampleTrend[]> {
    if (this.cache) {
      return this.cache;
    }

    const content = await readFileIfExists(this.config.trendsPath);
    if (content === null) {
      logger.warn('Sample trends file not found', { path: this.config.trendsPath });
      return [];
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new ConfigError(`Sample trends file is not valid JSON: ${this.config.trendsPath}`, {
        error: error instanceof Error ? error.message : String(error)
      });
    }

    const validation = validateRecord(sampleTrendsSchema, raw);
    if (!validation.ok) {
      throw new ConfigError('Invalid sample trends file', validation.problems);
    }

    this.cache = validation.value.sample_trends;
    return this.cache;
  }
}
