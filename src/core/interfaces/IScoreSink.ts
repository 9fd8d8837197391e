import { Result, ScoredNetwork } from "../types";

/**
 * Receiver of published scores (the platform's network scorer)
 */
export interface IScoreSink {
  /**
   * @param networks Never empty, never contains wildcard entries
   */
  updateScores(networks: ScoredNetwork[]): Promise<Result<void>>;
}
