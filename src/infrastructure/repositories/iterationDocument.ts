import Joi from 'joi';
import { CampaignContext } from '../../domain/entities/CampaignContext';
import { Critique, CritiqueDocument, CRITIQUE_CATEGORIES } from '../../domain/entities/Critique';
import { Decision } from '../../domain/entities/Decision';
import { IterationRecord, IterationStatus } from '../../domain/entities/IterationRecord';
import { Proposal, ProposalDocument } from '../../domain/entities/Proposal';
import { EngagementOutcome } from '../../domain/valueObjects/EngagementOutcome';
import { RenderedContent } from '../../domain/valueObjects/RenderedContent';
import { WeightHistoryEntry } from '../../domain/valueObjects/WeightHistoryEntry';
import { ConfigError } from '../../domain/errors/CouncilErrors';
import { validateRecord } from '../council/recordSchemas';

/**
 * Stored form of an IterationRecord: proposals and critiques as plain documents
 */
export interface IterationDocument {
  iterationIndex: number;
  status: IterationStatus;
  startedAt: string;
  completedAt: string | null;
  context: CampaignContext;
  trends: string[];
  proposals: ProposalDocument[];
  critiques: CritiqueDocument[];
  decision: Decision;
  content: RenderedContent | null;
  weightsBefore: Record<string, number>;
  weightsAfter: Record<string, number> | null;
  outcome: EngagementOutcome | null;
}

const weightsSchema = Joi.object().pattern(Joi.string(), Joi.number());

const iterationDocumentSchema = Joi.object<IterationDocument>({
  iterationIndex: Joi.number().integer().min(1).required(),
  status: Joi.string().valid(...Object.values(IterationStatus)).required(),
  startedAt: Joi.string().required(),
  completedAt: Joi.string().allow(null).required(),
  context: Joi.object().unknown(true).required(),
  trends: Joi.array().items(Joi.string()).required(),
  proposals: Joi.array().items(
    Joi.object({
      id: Joi.string().required(),
      agentId: Joi.string().required(),
      platform: Joi.string().required(),
      approach: Joi.string().allow('').required(),
      reasoning: Joi.string().allow('').required(),
      score: Joi.number().required(),
      isFallback: Joi.boolean().default(false)
    })
  ).required(),
  critiques: Joi.array().items(
    Joi.object({
      id: Joi.string().required(),
      criticId: Joi.string().required(),
      proposalId: Joi.string().required(),
      category: Joi.string().valid(...CRITIQUE_CATEGORIES).required(),
      detail: Joi.string().allow('').required(),
      degraded: Joi.boolean().default(false)
    })
  ).required(),
  decision: Joi.object().unknown(true).required(),
  content: Joi.object().unknown(true).allow(null).required(),
  weightsBefore: weightsSchema.required(),
  weightsAfter: weightsSchema.allow(null).required(),
  outcome: Joi.object({ overallScore: Joi.number().min(0).max(10).required() }).unknown(true).allow(null).required()
});

const historyEntrySchema = Joi.object<WeightHistoryEntry>({
  iterationIndex: Joi.number().integer().min(1).required(),
  timestamp: Joi.string().required(),
  weights: weightsSchema.required(),
  winnerId: Joi.string().required(),
  outcomeScore: Joi.number().required()
});

export function toIterationDocument(record: IterationRecord): IterationDocument {
  return {
    iterationIndex: record.iterationIndex,
    status: record.status,
    startedAt: record.startedAt,
    completedAt: record.completedAt,
    context: record.context,
    trends: [...record.trends],
    proposals: record.proposals.map(p => ({
      id: p.id,
      agentId: p.agentId,
      platform: p.platform,
      approach: p.approach,
      reasoning: p.reasoning,
      score: p.score,
      isFallback: p.isFallback
    })),
    critiques: record.critiques.map(c => ({
      id: c.id,
      criticId: c.criticId,
      proposalId: c.proposalId,
      category: c.category,
      detail: c.detail,
      degraded: c.degraded
    })),
    decision: record.decision,
    content: record.content,
    weightsBefore: { ...record.weightsBefore },
    weightsAfter: record.weightsAfter ? { ...record.weightsAfter } : null,
    outcome: record.outcome
  };
}

export function fromIterationDocument(raw: unknown, source: string): IterationRecord {
  const validation = validateRecord(iterationDocumentSchema, raw);
  if (!validation.ok) {
    throw new ConfigError(`Invalid iteration record in ${source}`, validation.problems);
  }
  const doc = validation.value;
  return {
    ...doc,
    proposals: doc.proposals.map(Proposal.fromDocument),
    critiques: doc.critiques.map(Critique.fromDocument)
  };
}

export function parseHistoryEntry(raw: unknown): WeightHistoryEntry | null {
  const validation = validateRecord(historyEntrySchema, raw);
  return validation.ok ? validation.value : null;
}
