import { BadgeLevel, Result, ScoredNetwork, failure, success } from "@core/types";
import { ScoreError } from "@core/errors";
import { SCORE_CONSTANT_CURVE_START } from "@core/constants";
import { createNetworkKey } from "@utils/networkKey";
import { toError } from "@utils/typeGuards";
import { getLogger } from "@utils/logger";
import { badgeCurveFor, createScoreCurve } from "./ScoreCurve";

const logger = getLogger("ScoreLineParser");

const BADGE_NAMES = new Map<string, BadgeLevel>([
  ["NONE", BadgeLevel.NONE],
  ["SD", BadgeLevel.SD],
  ["HD", BadgeLevel.HD],
  ["4K", BadgeLevel.UHD_4K],
]);

const INTEGER = /^-?\d+$/;

/**
 * Parser for the diagnostic score line:
 *
 * ```
 * "<ssid>",<bssid>|<bucketWidth>,<sample0>,<sample1>,...|<metered 0|1>|<captivePortal 0|1>|<NONE|SD|HD|4K>
 * ```
 *
 * Curves start at -150 dBm. The BSSID may be `any` for a wildcard score.
 * A line is accepted whole or not at all.
 */
export class ScoreLineParser {
  parse(line: string): Result<ScoredNetwork> {
    const fields = line.trim().split("|");
    if (fields.length !== 5) {
      return this.reject(line, `expected 5 fields, got ${fields.length}`);
    }
    const [keyField, curveField, meteredField, captiveField, badgeField] =
      fields;

    const separator = keyField.lastIndexOf(",");
    if (separator < 0) {
      return this.reject(line, "missing bssid");
    }

    const samples = curveField.split(",");
    if (samples.length < 2 || !samples.every((s) => INTEGER.test(s))) {
      return this.reject(line, "curve must be integers: width,sample,...");
    }

    const metered = this.parseFlag(meteredField);
    const captivePortal = this.parseFlag(captiveField);
    if (metered === null || captivePortal === null) {
      return this.reject(line, "flags must be 0 or 1");
    }

    const badgeLevel = BADGE_NAMES.get(badgeField);
    if (badgeLevel === undefined) {
      return this.reject(line, ScoreError.invalidBadge(badgeField).message);
    }

    try {
      const networkKey = createNetworkKey(
        keyField.slice(0, separator),
        keyField.slice(separator + 1),
      );
      const [bucketWidth, ...buckets] = samples.map((s) => parseInt(s, 10));
      const curve = createScoreCurve(
        SCORE_CONSTANT_CURVE_START,
        bucketWidth,
        buckets,
      );
      return success({
        networkKey,
        curve,
        meteredHint: metered,
        hasCaptivePortal: captivePortal,
        badgeLevel,
        badgeCurve: badgeCurveFor(badgeLevel),
      });
    } catch (error) {
      return this.reject(line, toError(error).message);
    }
  }

  /**
   * Render a stored score back into the line format
   */
  format(network: ScoredNetwork): string {
    const { networkKey, curve } = network;
    const badge =
      [...BADGE_NAMES].find(([, level]) => level === network.badgeLevel)?.[0] ??
      "NONE";
    return [
      `${networkKey.ssid},${networkKey.bssid}`,
      [curve.bucketWidth, ...curve.buckets].join(","),
      network.meteredHint ? "1" : "0",
      network.hasCaptivePortal ? "1" : "0",
      badge,
    ].join("|");
  }

  private parseFlag(field: string): boolean | null {
    if (field === "1") return true;
    if (field === "0") return false;
    return null;
  }

  private reject(line: string, reason: string): Result<ScoredNetwork> {
    logger.warn(`Rejected score line: ${reason}`);
    return failure(ScoreError.malformedLine(line, reason));
  }
}
