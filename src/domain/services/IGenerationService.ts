import { Agent } from '../entities/Agent';
import { CampaignContext } from '../entities/CampaignContext';
import { Proposal } from '../entities/Proposal';

/**
 * Text generation collaborator. Results are untyped on purpose: the stages validate
 * every record before it becomes a Proposal or Critique.
 */
export interface IGenerationService {
  /**
   * Backend identifier (e.g., 'openai', 'claude', 'gemini', 'mock')
   */
  readonly providerName: string;

  /**
   * Asks the agent for up to `count` proposal-shaped records
   */
  generateProposals(agent: Agent, context: CampaignContext, count: number): Promise<unknown[]>;

  /**
   * Asks the critic for one critique-shaped record about a peer's proposal
   */
  generateCritique(critic: Agent, proposal: Proposal, context: CampaignContext): Promise<unknown>;
}
