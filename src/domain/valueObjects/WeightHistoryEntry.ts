export interface WeightHistoryEntry {
  readonly iterationIndex: number;
  readonly timestamp: string;
  /** weights after the update for this iteration */
  readonly weights: Readonly<Record<string, number>>;
  readonly winnerId: string;
  readonly outcomeScore: number;
}
