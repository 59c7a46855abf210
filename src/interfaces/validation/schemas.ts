import Joi from 'joi';
import { CampaignContext } from '../../domain/entities/CampaignContext';
import { EngagementOutcome } from '../../domain/valueObjects/EngagementOutcome';
import { AppError } from '../../domain/errors/AppError';

export type OutcomeInput = Omit<EngagementOutcome, 'source'>;

export interface RunIterationBody {
  context: CampaignContext;
  outcome?: OutcomeInput;
  deferOutcome?: boolean;
}

export const campaignContextSchema = Joi.object<CampaignContext>({
  brandName: Joi.string().trim().min(1).max(200).required(),
  industry: Joi.string().trim().min(1).max(200).required(),
  productInfo: Joi.string().trim().min(1).max(2000).required(),
  targetAudience: Joi.string().trim().min(1).max(500).required(),
  trends: Joi.array().items(Joi.string().trim().min(1).max(300)).max(20)
});

export const outcomeSchema = Joi.object<OutcomeInput>({
  overallScore: Joi.number().min(0).max(10).required().messages({
    'number.min': 'Outcome score must be between 0 and 10',
    'number.max': 'Outcome score must be between 0 and 10'
  }),
  predictedReach: Joi.number().min(0),
  riskScore: Joi.number().min(0).max(10),
  metrics: Joi.object().pattern(Joi.string(), Joi.number())
});

export const runIterationBodySchema = Joi.object<RunIterationBody>({
  context: campaignContextSchema.required(),
  outcome: outcomeSchema,
  deferOutcome: Joi.boolean()
}).oxor('outcome', 'deferOutcome');

export const iterationIndexParamsSchema = Joi.object<{ index: number }>({
  index: Joi.number().integer().min(1).required()
}).unknown(true);

export const compareQuerySchema = Joi.object<{ a: number; b: number }>({
  a: Joi.number().integer().min(1).required(),
  b: Joi.number().integer().min(1).required()
}).unknown(true);

/**
 * Validates one part of a request, converting values where Joi can
 */
export function parseRequest<T>(schema: Joi.ObjectSchema<T>, raw: unknown): T {
  const { error, value } = schema.validate(raw, { abortEarly: false, stripUnknown: true });

  if (error) {
    throw AppError.validationError(
      'Validation failed',
      error.details.map(detail => ({
        field: detail.path.join('.'),
        message: detail.message
      }))
    );
  }
  return value;
}
