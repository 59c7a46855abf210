export enum CritiqueCategory {
  GOAL_CONFLICT = 'goal_conflict',
  RISK = 'risk',
  MISSED_OPPORTUNITY = 'missed_opportunity'
}

export const CRITIQUE_CATEGORIES: ReadonlyArray<CritiqueCategory> = [
  CritiqueCategory.GOAL_CONFLICT,
  CritiqueCategory.RISK,
  CritiqueCategory.MISSED_OPPORTUNITY
];

export interface CritiqueDocument {
  id: string;
  criticId: string;
  proposalId: string;
  category: CritiqueCategory;
  detail: string;
  degraded: boolean;
}

export class Critique {
  constructor(
    public readonly id: string,
    public readonly criticId: string,
    public readonly proposalId: string,
    public readonly category: CritiqueCategory,
    public readonly detail: string,
    public readonly degraded: boolean = false
  ) {
    if (!criticId || criticId.trim() === '') {
      throw new Error('Critic ID cannot be empty');
    }

    if (!proposalId || proposalId.trim() === '') {
      throw new Error('Critique must reference a proposal');
    }
  }

  /**
   * Empty-detail critique recorded when the critic's generation attempt fails
   */
  static degraded(id: string, criticId: string, proposalId: string): Critique {
    return new Critique(id, criticId, proposalId, CritiqueCategory.MISSED_OPPORTUNITY, '', true);
  }

  static fromDocument(doc: CritiqueDocument): Critique {
    return new Critique(doc.id, doc.criticId, doc.proposalId, doc.category, doc.detail, doc.degraded);
  }
}
