import { AgentRecord } from '../entities/Agent';

export interface AgentStateDocument {
  /** last iteration whose learning update is reflected in these weights */
  appliedIteration: number;
  agents: AgentRecord[];
}

export interface IAgentStateRepository {
  /**
   * Reads the raw roster document; validation is the registry's job
   */
  load(): Promise<unknown>;

  /**
   * Replaces the stored roster as a whole. Readers see either the old or the new state.
   */
  save(document: AgentStateDocument): Promise<void>;
}
