import {
  NetworkKey,
  Recommendation,
  RecommendationRequest,
  Result,
  ScoredNetwork,
} from "../types";

/**
 * Recommendation Provider Interface
 *
 * What the notification state machine needs from the recommendation engine.
 */
export interface IRecommendationProvider {
  /**
   * Pick the network the device should connect to
   * @returns Failure when a scan carries a malformed BSSID
   */
  recommend(request: RecommendationRequest): Result<Recommendation>;

  /**
   * Stored score for a key (exact match, then wildcard)
   */
  getCachedScoredNetwork(key: NetworkKey): ScoredNetwork | undefined;
}
