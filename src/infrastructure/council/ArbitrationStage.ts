import { injectable, inject } from 'inversify';
import { Critique } from '../../domain/entities/Critique';
import { Decision, ProposalScore } from '../../domain/entities/Decision';
import { Proposal } from '../../domain/entities/Proposal';
import { AppError } from '../../domain/errors/AppError';
import { UnknownAgentError } from '../../domain/errors/CouncilErrors';
import { CouncilConfig } from '../../config/councilConfig';

const MAX_CITED_CRITIQUES = 3;

interface RankedProposal {
  proposal: Proposal;
  position: number;
  score: ProposalScore;
  critiques: Critique[];
}

/**
 * Turns proposals, critiques and current weights into a single ranked decision.
 * Pure and deterministic: no I/O, no clock, no randomness.
 */
@injectable()
export class ArbitrationStage {
  constructor(@inject('CouncilConfig') private config: CouncilConfig) {}

  decide(
    proposals: ReadonlyArray<Proposal>,
    critiques: ReadonlyArray<Critique>,
    weights: Readonly<Record<string, number>>
  ): Decision {
    this.checkPreconditions(proposals, critiques, weights);

    const critiquesByProposal = new Map<string, Critique[]>();
    for (const critique of critiques) {
      const list = critiquesByProposal.get(critique.proposalId) || [];
      list.push(critique);
      critiquesByProposal.set(critique.proposalId, list);
    }

    const ranked: RankedProposal[] = proposals.map((proposal, position) => {
      const received = critiquesByProposal.get(proposal.id) || [];
      const penalty = received.reduce((sum, critique) => sum + this.penaltyFor(critique), 0);
      const weight = weights[proposal.agentId];
      const adjustedScore = round(Math.max(0, proposal.score - penalty) * weight);

      return {
        proposal,
        position,
        critiques: received,
        score: {
          proposalId: proposal.id,
          agentId: proposal.agentId,
          selfScore: proposal.score,
          penalty,
          weight,
          adjustedScore,
          critiqueCount: received.length
        }
      };
    });

    ranked.sort(compareRanked);

    const winner = ranked[0];
    const agentScores: Record<string, number> = {};
    for (const entry of ranked) {
      const current = agentScores[entry.proposal.agentId];
      if (current === undefined || entry.score.adjustedScore > current) {
        agentScores[entry.proposal.agentId] = entry.score.adjustedScore;
      }
    }

    return {
      proposalId: winner.proposal.id,
      winnerId: winner.proposal.agentId,
      platform: winner.proposal.platform,
      approach: winner.proposal.approach,
      agentScores,
      ranking: ranked.map(entry => entry.score),
      justification: this.buildJustification(ranked)
    };
  }

  penaltyFor(critique: Critique): number {
    if (critique.degraded) {
      return 0;
    }
    return this.config.penalties[critique.category];
  }

  private buildJustification(ranked: RankedProposal[]): string {
    const [winner, runnerUp] = ranked;
    const lines: string[] = [];
    const s = winner.score;

    lines.push(
      `${s.agentId}'s ${winner.proposal.platform} proposal "${winner.proposal.approach}" ranked first ` +
      `with adjusted score ${formatScore(s.adjustedScore)} ` +
      `(self-rating ${s.selfScore}, critique penalty ${s.penalty}, weight ${formatScore(s.weight)}).`
    );

    if (runnerUp) {
      const r = runnerUp.score;
      if (r.adjustedScore === s.adjustedScore) {
        const reason = r.selfScore !== s.selfScore
          ? `higher self-rating (${s.selfScore} vs ${r.selfScore})`
          : r.agentId !== s.agentId
            ? `agent id order (${s.agentId} before ${r.agentId})`
            : 'proposal order';
        lines.push(`Tied with ${r.agentId}'s proposal ${r.proposalId}; tie broken by ${reason}.`);
      } else {
        lines.push(`Runner-up: ${r.agentId}'s proposal ${r.proposalId} with ${formatScore(r.adjustedScore)}.`);
      }
    }

    const cited = [winner, runnerUp]
      .filter((entry): entry is RankedProposal => entry !== undefined)
      .flatMap(entry => this.topCritiques(entry.critiques));

    if (cited.length > 0) {
      lines.push('Critiques that affected the outcome:');
      for (const critique of cited) {
        lines.push(
          `- ${critique.criticId} flagged ${critique.category} on ${critique.proposalId} ` +
          `(-${this.penaltyFor(critique)}): ${critique.detail || '(no detail)'}`
        );
      }
    } else {
      lines.push('No critiques affected the outcome.');
    }

    return lines.join('\n');
  }

  private topCritiques(critiques: Critique[]): Critique[] {
    return critiques
      .filter(critique => this.penaltyFor(critique) > 0)
      .map((critique, index) => ({ critique, index }))
      .sort((a, b) => (this.penaltyFor(b.critique) - this.penaltyFor(a.critique)) || (a.index - b.index))
      .slice(0, MAX_CITED_CRITIQUES)
      .map(entry => entry.critique);
  }

  private checkPreconditions(
    proposals: ReadonlyArray<Proposal>,
    critiques: ReadonlyArray<Critique>,
    weights: Readonly<Record<string, number>>
  ): void {
    if (proposals.length === 0) {
      throw AppError.validationError('Arbitration requires at least one proposal');
    }

    for (const proposal of proposals) {
      if (weights[proposal.agentId] === undefined) {
        throw new UnknownAgentError(proposal.agentId);
      }
    }

    const proposalIds = new Set(proposals.map(p => p.id));
    const orphan = critiques.find(critique => !proposalIds.has(critique.proposalId));
    if (orphan) {
      throw AppError.validationError('Critique references a proposal outside this iteration', {
        critiqueId: orphan.id,
        proposalId: orphan.proposalId
      });
    }
  }
}

// Adjusted score, then self-rating, then agent id, then proposal order
function compareRanked(a: RankedProposal, b: RankedProposal): number {
  if (a.score.adjustedScore !== b.score.adjustedScore) {
    return b.score.adjustedScore - a.score.adjustedScore;
  }
  if (a.score.selfScore !== b.score.selfScore) {
    return b.score.selfScore - a.score.selfScore;
  }
  if (a.score.agentId !== b.score.agentId) {
    return a.score.agentId < b.score.agentId ? -1 : 1;
  }
  return a.position - b.position;
}

function round(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

function formatScore(value: number): string {
  return value.toFixed(2);
}

