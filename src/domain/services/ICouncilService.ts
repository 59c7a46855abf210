import { Agent } from '../entities/Agent';
import { CampaignContext } from '../entities/CampaignContext';
import { IterationRecord } from '../entities/IterationRecord';
import { EngagementOutcome } from '../valueObjects/EngagementOutcome';
import { WeightHistoryEntry } from '../valueObjects/WeightHistoryEntry';
import { IOutcomeProvider } from './IOutcomeProvider';

export interface RunIterationOptions {
  signal?: AbortSignal;
}

export interface IterationComparison {
  iterationA: { index: number; winnerId: string; outcomeScore: number; weights: Record<string, number> };
  iterationB: { index: number; winnerId: string; outcomeScore: number; weights: Record<string, number> };
  winnerChanged: boolean;
  scoreDelta: number;
}

export interface ICouncilService {
  /**
   * Runs one proposal → critique → arbitration → learning pass. The only entry point
   * presentation layers use.
   */
  runIteration(
    context: CampaignContext,
    outcomeProvider: IOutcomeProvider,
    options?: RunIterationOptions
  ): Promise<IterationRecord>;

  /**
   * Supplies the missing outcome for an iteration left waiting
   */
  submitOutcome(iterationIndex: number, outcome: EngagementOutcome): Promise<IterationRecord>;

  getIteration(iterationIndex: number): Promise<IterationRecord>;

  listAgents(): ReadonlyArray<Agent>;

  getHistory(): Promise<WeightHistoryEntry[]>;

  getWeightSeries(): Promise<Record<string, number[]>>;

  compareIterations(a: number, b: number): Promise<IterationComparison>;
}
