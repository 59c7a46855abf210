import Joi from 'joi';
import { AgentRecord } from '../../domain/entities/Agent';
import { CRITIQUE_CATEGORIES, CritiqueCategory } from '../../domain/entities/Critique';
import { MAX_PROPOSAL_SCORE, MIN_PROPOSAL_SCORE } from '../../domain/entities/Proposal';

export interface RosterDocument {
  appliedIteration: number;
  agents: AgentRecord[];
}

export interface ProposalRecord {
  platform: string;
  approach: string;
  reasoning: string;
  score: number;
}

export interface CritiqueRecord {
  category: CritiqueCategory;
  detail: string;
}

const agentRecordSchema = Joi.object<AgentRecord>({
  id: Joi.string().trim().min(1).required().messages({
    'any.required': 'Agent entry is missing an id',
    'string.empty': 'Agent id cannot be empty'
  }),
  name: Joi.string().allow(''),
  role: Joi.string().allow('').default(''),
  personality: Joi.string().allow('').default(''),
  goals: Joi.array().items(Joi.string()).default([]),
  weight: Joi.number().required().messages({
    'any.required': 'Agent entry is missing a weight'
  }),
  wins: Joi.number().integer().min(0).default(0),
  losses: Joi.number().integer().min(0).default(0),
  color: Joi.string()
});

export const rosterSchema = Joi.object<RosterDocument>({
  appliedIteration: Joi.number().integer().min(0).default(0),
  agents: Joi.array()
    .items(agentRecordSchema)
    .min(1)
    .unique('id')
    .required()
    .messages({
      'array.unique': 'Two agents share the same id',
      'array.min': 'Agent roster cannot be empty'
    })
}).unknown(true);

export const proposalRecordSchema = Joi.object<ProposalRecord>({
  platform: Joi.string().trim().min(1).required(),
  approach: Joi.string().trim().min(1).required(),
  reasoning: Joi.string().allow('').default(''),
  score: Joi.number().min(MIN_PROPOSAL_SCORE).max(MAX_PROPOSAL_SCORE).required()
}).unknown(true);

export const critiqueRecordSchema = Joi.object<CritiqueRecord>({
  category: Joi.string()
    .lowercase()
    .valid(...CRITIQUE_CATEGORIES)
    .required(),
  detail: Joi.string().allow('').default('')
}).unknown(true);

export interface FieldProblem {
  field: string;
  message: string;
}

export type RecordValidation<T> = { ok: true; value: T } | { ok: false; problems: FieldProblem[] };

export function validateRecord<T>(schema: Joi.ObjectSchema<T>, raw: unknown): RecordValidation<T> {
  const result = schema.validate(raw, { abortEarly: false });

  if (result.error) {
    return {
      ok: false,
      problems: result.error.details.map(detail => ({
        field: detail.path.join('.'),
        message: detail.message
      }))
    };
  }

  if (result.value === undefined || result.value === null) {
    return { ok: false, problems: [{ field: '', message: 'Record is empty' }] };
  }

  return { ok: true, value: result.value };
}
