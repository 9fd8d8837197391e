import { INetworkSelector } from "@core/interfaces";
import { SavedNetwork, ScanObservation, SelectorConfig } from "@core/types";
import { is24GHz, is5GHz, securityFromCapabilities } from "@utils/networkKey";

/**
 * Picks the saved network the device would most likely join if Wi-Fi were on.
 *
 * Candidates are scans of saved networks that pass the band's RSSI threshold
 * and advertise the security the network was saved with. Each candidate scores
 *
 * ```
 * (min(rssi, thresholdSaturatedRssi24) + rssiScoreOffset) * rssiScoreSlope
 *   + band5GHzAward            (5 GHz only)
 *   + passpointSecurityAward   (passpoint)  or  securityAward (any other non-open network)
 * ```
 *
 * The highest score wins. On a tie the candidate seen first in the scan list
 * is kept.
 */
export class NetworkSelector implements INetworkSelector {
  constructor(private readonly config: SelectorConfig) {}

  /**
   * @param savedNetworks Saved networks keyed by unquoted SSID
   */
  selectNetwork(
    savedNetworks: ReadonlyMap<string, SavedNetwork>,
    scans: readonly ScanObservation[],
  ): SavedNetwork | null {
    let candidate: SavedNetwork | null = null;
    let candidateScore = 0;

    for (const scan of scans) {
      const saved = savedNetworks.get(scan.ssid);
      if (!saved) {
        continue;
      }
      if (!this.isQualified(scan)) {
        continue;
      }
      if (securityFromCapabilities(scan.capabilities) !== saved.security) {
        continue;
      }
      const score = this.calculateScore(scan, saved);
      if (candidate === null || score > candidateScore) {
        candidate = saved;
        candidateScore = score;
      }
    }

    return candidate;
  }

  calculateScore(scan: ScanObservation, saved: SavedNetwork): number {
    const {
      thresholdSaturatedRssi24,
      rssiScoreOffset,
      rssiScoreSlope,
      band5GHzAward,
      passpointSecurityAward,
      securityAward,
    } = this.config;

    let score =
      (Math.min(scan.rssi, thresholdSaturatedRssi24) + rssiScoreOffset) *
      rssiScoreSlope;

    if (is5GHz(scan.frequency)) {
      score += band5GHzAward;
    }

    if (saved.passpoint) {
      score += passpointSecurityAward;
    } else if (saved.security !== "open") {
      score += securityAward;
    }

    return score;
  }

  private isQualified(scan: ScanObservation): boolean {
    if (is5GHz(scan.frequency)) {
      return scan.rssi >= this.config.thresholdQualifiedRssi5;
    }
    if (is24GHz(scan.frequency)) {
      return scan.rssi >= this.config.thresholdQualifiedRssi24;
    }
    return true;
  }
}
