import { BadgeLevel, ScoreCurve, ScoredNetwork } from "@core/types";
import { ScoreError } from "@core/errors";
import {
  SCORE_CONSTANT_CURVE_START,
  SCORE_CONSTANT_CURVE_WIDTH,
  SCORE_SAMPLE_MAX,
  SCORE_SAMPLE_MIN,
} from "@core/constants";
import { isBadgeLevel } from "@utils/typeGuards";

/**
 * Build a curve after checking its shape.
 *
 * @throws ScoreError (SCORE_INVALID_CURVE) for an empty curve, a bucket width
 * below 1 or a sample outside the signed byte range
 */
export function createScoreCurve(
  start: number,
  bucketWidth: number,
  buckets: readonly number[],
): ScoreCurve {
  if (!Number.isInteger(bucketWidth) || bucketWidth < 1) {
    throw ScoreError.invalidCurve(`bucket width ${bucketWidth}`);
  }
  if (buckets.length === 0) {
    throw ScoreError.invalidCurve("no buckets");
  }
  const outOfRange = buckets.find(
    (sample) =>
      !Number.isInteger(sample) ||
      sample < SCORE_SAMPLE_MIN ||
      sample > SCORE_SAMPLE_MAX,
  );
  if (outOfRange !== undefined) {
    throw ScoreError.invalidCurve(`sample ${outOfRange}`);
  }
  return Object.freeze({
    start,
    bucketWidth,
    buckets: Object.freeze([...buckets]),
  });
}

/**
 * A curve that yields `value` for every RSSI
 */
export function createConstantCurve(value: number): ScoreCurve {
  return createScoreCurve(
    SCORE_CONSTANT_CURVE_START,
    SCORE_CONSTANT_CURVE_WIDTH,
    [value],
  );
}

/**
 * Score at `rssi`. Readings outside the curve clamp to the first or last
 * bucket.
 */
export function lookupScore(curve: ScoreCurve, rssi: number): number {
  if (curve.buckets.length === 0) {
    return SCORE_SAMPLE_MIN;
  }
  const index = Math.floor((rssi - curve.start) / curve.bucketWidth);
  const clamped = Math.max(0, Math.min(curve.buckets.length - 1, index));
  return curve.buckets[clamped];
}

/**
 * Badge shown for a network at `rssi`, NONE when it has no badge curve
 */
export function calculateBadge(network: ScoredNetwork, rssi: number): BadgeLevel {
  if (!network.badgeCurve) {
    return BadgeLevel.NONE;
  }
  const value = lookupScore(network.badgeCurve, rssi);
  return isBadgeLevel(value) ? value : BadgeLevel.NONE;
}

/**
 * Badge curve stored alongside a score, undefined for NONE
 */
export function badgeCurveFor(level: BadgeLevel): ScoreCurve | undefined {
  return level === BadgeLevel.NONE ? undefined : createConstantCurve(level);
}
