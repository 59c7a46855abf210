export interface AgentRecord {
  id: string;
  name: string;
  role: string;
  personality: string;
  goals: string[];
  weight: number;
  wins: number;
  losses: number;
  color?: string;
}

/**
 * A council member. Instances are immutable; the registry replaces an agent with a
 * new instance when its weight or win/loss counters change.
 */
export class Agent {
  constructor(
    public readonly id: string,
    public readonly name: string,
    public readonly role: string,
    public readonly personality: string,
    public readonly goals: ReadonlyArray<string>,
    public readonly weight: number,
    public readonly wins: number = 0,
    public readonly losses: number = 0,
    public readonly color?: string
  ) {
    if (!id || id.trim() === '') {
      throw new Error('Agent ID cannot be empty');
    }

    if (!Number.isFinite(weight) || weight <= 0) {
      throw new Error('Agent weight must be a positive number');
    }
  }

  static fromRecord(record: AgentRecord): Agent {
    return new Agent(
      record.id,
      record.name,
      record.role,
      record.personality,
      [...record.goals],
      record.weight,
      record.wins,
      record.losses,
      record.color
    );
  }

  withWeight(weight: number): Agent {
    return new Agent(this.id, this.name, this.role, this.personality, this.goals, weight, this.wins, this.losses, this.color);
  }

  withResult(won: boolean): Agent {
    return new Agent(
      this.id,
      this.name,
      this.role,
      this.personality,
      this.goals,
      this.weight,
      won ? this.wins + 1 : this.wins,
      won ? this.losses : this.losses + 1,
      this.color
    );
  }

  /**
   * Share of completed iterations this agent won, 0 before the first one
   */
  getWinRate(): number {
    const total = this.wins + this.losses;
    return total === 0 ? 0 : this.wins / total;
  }

  toRecord(): AgentRecord {
    return {
      id: this.id,
      name: this.name,
      role: this.role,
      personality: this.personality,
      goals: [...this.goals],
      weight: this.weight,
      wins: this.wins,
      losses: this.losses,
      ...(this.color !== undefined && { color: this.color })
    };
  }
}
