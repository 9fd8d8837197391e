import { IScoreSink } from "@core/interfaces";
import { Result, ScoredNetwork, success } from "@core/types";
import { formatNetworkKey } from "@utils/networkKey";
import { getLogger } from "@utils/logger";

const logger = getLogger("LoggingScoreSink");

/**
 * Score sink for standalone runs: writes published scores to the log and
 * remembers the latest one per key for the status endpoint.
 */
export class LoggingScoreSink implements IScoreSink {
  private readonly latest = new Map<string, ScoredNetwork>();

  async updateScores(networks: ScoredNetwork[]): Promise<Result<void>> {
    for (const network of networks) {
      const key = formatNetworkKey(network.networkKey);
      this.latest.set(key, network);
      logger.info(
        `Published score for ${key} (metered=${network.meteredHint}, captivePortal=${network.hasCaptivePortal})`,
      );
    }
    return success(undefined);
  }

  getPublishedCount(): number {
    return this.latest.size;
  }
}
