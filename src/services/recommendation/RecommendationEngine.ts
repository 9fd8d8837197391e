import {
  IRecommendationProvider,
  IScoreSink,
  IScoreStore,
  ISavedNetworkSource,
} from "@core/interfaces";
import {
  NetworkKey,
  Recommendation,
  RecommendationRequest,
  Result,
  SavedNetwork,
  ScanObservation,
  ScoredNetwork,
  failure,
  success,
} from "@core/types";
import { RecommendationError, ScoreError } from "@core/errors";
import {
  createScanKey,
  formatNetworkKey,
  isWildcardKey,
  securityFromCapabilities,
} from "@utils/networkKey";
import { toError } from "@utils/typeGuards";
import { getLogger } from "@utils/logger";
import { lookupScore } from "@services/score/ScoreCurve";
import { ScoreLineParser } from "@services/score/ScoreLineParser";

const logger = getLogger("RecommendationEngine");

/**
 * Optional first argument of a diagnostic command
 */
const COMMAND_PREFIX = "netrec";

type Candidate = {
  scan: ScanObservation;
  score: ScoredNetwork;
  value: number;
};

/**
 * Recommendation Engine
 *
 * Answers "which network should the device join" from the scores held in the
 * score store, publishes concrete scores to the score sink and accepts manual
 * score injection for diagnostics.
 */
export class RecommendationEngine implements IRecommendationProvider {
  private readonly parser = new ScoreLineParser();

  constructor(
    private readonly store: IScoreStore,
    private readonly sink: IScoreSink,
    private readonly savedNetworks: ISavedNetworkSource,
  ) {}

  /**
   * With no scans the current recommendation stands. Otherwise the scan whose
   * score curve gives the highest value at its RSSI wins; the first one on a
   * tie. Scans without a stored score are ignored. A saved match is returned
   * with the BSSID of the winning scan.
   */
  recommend(request: RecommendationRequest): Result<Recommendation> {
    if (request.scans.length === 0) {
      return success({ connect: request.currentConfig ?? null });
    }

    const saved = new Map<string, SavedNetwork>();
    for (const network of this.savedNetworks.getConfiguredNetworks()) {
      saved.set(network.ssid, network);
    }

    let best: Candidate | null = null;
    for (const scan of request.scans) {
      if (request.capabilityFilter.requireTrusted && !saved.has(scan.ssid)) {
        continue;
      }

      let key: NetworkKey;
      try {
        key = createScanKey(scan.ssid, scan.bssid);
      } catch (error) {
        logger.warn(`Rejected recommendation request: ${toError(error).message}`);
        return failure(toError(error));
      }

      const score = this.store.get(key);
      if (!score) {
        continue;
      }
      const value = lookupScore(score.curve, scan.rssi);
      if (best === null || value > best.value) {
        best = { scan, score, value };
      }
    }

    if (best === null) {
      logger.debug(`No scored network among ${request.scans.length} scan(s)`);
      return success({ connect: null });
    }

    const savedMatch = saved.get(best.scan.ssid);
    const connect = savedMatch
      ? { ...savedMatch, bssid: best.scan.bssid.toLowerCase() }
      : this.synthesize(best);
    logger.info(
      `Recommending ${connect.ssid} (score ${best.value}${connect.ephemeral ? ", ephemeral" : ""})`,
    );
    return success({ connect });
  }

  /**
   * Publish the stored scores for `keys` to the sink. Wildcard entries stay
   * internal; the sink is only called when something is left to publish.
   */
  async onRequestScores(
    keys: readonly NetworkKey[],
  ): Promise<Result<ScoredNetwork[]>> {
    if (keys.length === 0) {
      return success([]);
    }

    const found: ScoredNetwork[] = [];
    for (const key of keys) {
      const score = this.store.get(key);
      if (score && !isWildcardKey(score.networkKey)) {
        found.push(score);
      }
    }
    logger.debug(`Score request for ${keys.length} key(s), ${found.length} found`);

    if (found.length === 0) {
      return success([]);
    }
    const published = await this.publish(found);
    return published.success ? success(found) : published;
  }

  /**
   * Parse and store one score line, then publish it unless it is a wildcard
   * score. A publish failure is logged; the score stays stored.
   */
  async addScoreFromLine(line: string): Promise<Result<ScoredNetwork>> {
    const parsed = this.parser.parse(line);
    if (!parsed.success) {
      return parsed;
    }

    const network = parsed.data;
    this.store.put(network);
    logger.info(`Added score for ${formatNetworkKey(network.networkKey)}`);

    if (!isWildcardKey(network.networkKey)) {
      const published = await this.publish([network]);
      if (!published.success) {
        logger.warn(published.error.message);
      }
    }
    return success(network);
  }

  /**
   * Diagnostic entry point.
   *
   * - no arguments: dump
   * - `addScore <line>`: add one score
   *
   * Either may be preceded by `netrec`.
   */
  async handleDiagnosticCommand(
    args: readonly string[],
  ): Promise<Result<string[]>> {
    const [command, ...rest] =
      args[0] === COMMAND_PREFIX ? args.slice(1) : args;

    if (command === undefined) {
      return success(this.dump());
    }
    if (command !== "addScore") {
      return failure(RecommendationError.unknownCommand(command));
    }
    if (rest.length === 0) {
      return failure(ScoreError.malformedLine("", "missing score line"));
    }

    const added = await this.addScoreFromLine(rest.join(" "));
    if (!added.success) {
      return added;
    }
    return success([`Added score: ${this.parser.format(added.data)}`]);
  }

  getCachedScoredNetwork(key: NetworkKey): ScoredNetwork | undefined {
    return this.store.get(key);
  }

  dump(): string[] {
    const entries = this.store.entries();
    return [
      `RecommendationEngine: ${entries.length} score(s) stored`,
      ...entries.map((entry) => `  ${this.parser.format(entry)}`),
    ];
  }

  private synthesize(best: Candidate): SavedNetwork {
    return {
      ssid: best.scan.ssid,
      bssid: best.scan.bssid.toLowerCase(),
      security: securityFromCapabilities(best.scan.capabilities),
      passpoint: false,
      enabled: true,
      useExternalScores: false,
      hasNoInternetAccess: false,
      noInternetAccessExpected: false,
      meteredHint: best.score.meteredHint,
      ephemeral: true,
    };
  }

  private async publish(networks: ScoredNetwork[]): Promise<Result<void>> {
    try {
      const result = await this.sink.updateScores(networks);
      if (!result.success) {
        return failure(ScoreError.publishFailed(networks.length, result.error));
      }
      return success(undefined);
    } catch (error) {
      return failure(ScoreError.publishFailed(networks.length, toError(error)));
    }
  }
}
