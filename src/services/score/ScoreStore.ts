import { IScoreStore } from "@core/interfaces";
import { NetworkKey, ScoredNetwork } from "@core/types";
import { formatNetworkKey, isWildcardKey } from "@utils/networkKey";
import { getLogger } from "@utils/logger";

const logger = getLogger("ScoreStore");

/**
 * Scores of one SSID. The wildcard entry and the per-access-point entries
 * live in separate slots so neither can overwrite the other.
 */
type SsidScores = {
  wildcard?: ScoredNetwork;
  byBssid: Map<string, ScoredNetwork>;
};

/**
 * In-memory score store.
 *
 * Every method runs to completion on the event loop, so a `put` is never
 * observed half-done by a `get` and the last writer for a key wins.
 */
export class ScoreStore implements IScoreStore {
  private readonly bySsid = new Map<string, SsidScores>();

  put(network: ScoredNetwork): void {
    const key = network.networkKey;
    let scores = this.bySsid.get(key.ssid);
    if (!scores) {
      scores = { byBssid: new Map() };
      this.bySsid.set(key.ssid, scores);
    }

    const frozen = Object.freeze({ ...network });
    if (isWildcardKey(key)) {
      scores.wildcard = frozen;
    } else {
      scores.byBssid.set(key.bssid, frozen);
    }
    logger.debug(`Stored score for ${formatNetworkKey(key)}`);
  }

  get(key: NetworkKey): ScoredNetwork | undefined {
    const scores = this.bySsid.get(key.ssid);
    if (!scores) {
      return undefined;
    }
    return scores.byBssid.get(key.bssid) ?? scores.wildcard;
  }

  size(): number {
    let count = 0;
    for (const scores of this.bySsid.values()) {
      count += scores.byBssid.size + (scores.wildcard ? 1 : 0);
    }
    return count;
  }

  entries(): ScoredNetwork[] {
    const result: ScoredNetwork[] = [];
    for (const scores of this.bySsid.values()) {
      if (scores.wildcard) {
        result.push(scores.wildcard);
      }
      result.push(...scores.byBssid.values());
    }
    return result;
  }
}
