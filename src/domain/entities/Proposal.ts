export const MIN_PROPOSAL_SCORE = 1;
export const MAX_PROPOSAL_SCORE = 10;

export interface ProposalDocument {
  id: string;
  agentId: string;
  platform: string;
  approach: string;
  reasoning: string;
  score: number;
  isFallback: boolean;
}

export class Proposal {
  constructor(
    public readonly id: string,
    public readonly agentId: string,
    public readonly platform: string,
    public readonly approach: string,
    public readonly reasoning: string,
    public readonly score: number,
    public readonly isFallback: boolean = false
  ) {
    if (!agentId || agentId.trim() === '') {
      throw new Error('Proposal agent ID cannot be empty');
    }

    if (!platform || platform.trim() === '') {
      throw new Error('Proposal platform cannot be empty');
    }

    if (!Number.isFinite(score) || score < MIN_PROPOSAL_SCORE || score > MAX_PROPOSAL_SCORE) {
      throw new Error(`Proposal score must be between ${MIN_PROPOSAL_SCORE} and ${MAX_PROPOSAL_SCORE}`);
    }
  }

  /**
   * Deterministic stand-in used when an agent's generation attempt fails
   */
  static fallback(id: string, agentId: string): Proposal {
    return new Proposal(
      id,
      agentId,
      'generic',
      'General brand awareness post',
      'Fallback proposal: generation was unavailable for this agent',
      5,
      true
    );
  }

  static fromDocument(doc: ProposalDocument): Proposal {
    return new Proposal(doc.id, doc.agentId, doc.platform, doc.approach, doc.reasoning, doc.score, doc.isFallback);
  }
}
