import { CampaignContext } from './CampaignContext';
import { Proposal } from './Proposal';
import { Critique } from './Critique';
import { Decision } from './Decision';
import { EngagementOutcome } from '../valueObjects/EngagementOutcome';
import { RenderedContent } from '../valueObjects/RenderedContent';

export enum IterationStatus {
  AWAITING_OUTCOME = 'awaiting_outcome',
  COMPLETED = 'completed'
}

export interface IterationRecord {
  readonly iterationIndex: number;
  readonly status: IterationStatus;
  readonly startedAt: string;
  readonly completedAt: string | null;
  readonly context: CampaignContext;
  readonly trends: ReadonlyArray<string>;
  readonly proposals: ReadonlyArray<Proposal>;
  readonly critiques: ReadonlyArray<Critique>;
  readonly decision: Decision;
  readonly content: RenderedContent | null;
  readonly weightsBefore: Readonly<Record<string, number>>;
  readonly weightsAfter: Readonly<Record<string, number>> | null;
  readonly outcome: EngagementOutcome | null;
}
