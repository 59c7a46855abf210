export interface ITrendService {
  /**
   * Returns formatted trend strings for the given industry/topic hint. May be empty.
   */
  fetchTrends(industryHint: string, limit: number): Promise<string[]>;
}
