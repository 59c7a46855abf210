export interface ProposalScore {
  proposalId: string;
  agentId: string;
  selfScore: number;
  penalty: number;
  weight: number;
  adjustedScore: number;
  critiqueCount: number;
}

export interface Decision {
  readonly proposalId: string;
  readonly winnerId: string;
  readonly platform: string;
  readonly approach: string;
  /** best adjusted score reached by each agent's proposals */
  readonly agentScores: Readonly<Record<string, number>>;
  /** every proposal, best first */
  readonly ranking: ReadonlyArray<ProposalScore>;
  readonly justification: string;
}
