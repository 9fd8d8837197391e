import { IRecommendationProvider } from "@core/interfaces";
import {
  NotificationBadge,
  NotificationContent,
  SavedNetwork,
  ScanObservation,
  attempt,
} from "@core/types";
import {
  SIGNAL_LEVELS,
  SIGNAL_MAX_RSSI,
  SIGNAL_MIN_RSSI,
} from "@core/constants";
import { createScanKey } from "@utils/networkKey";
import { calculateBadge } from "@services/score/ScoreCurve";

const TITLE = "Open Wi-Fi network available";
const FAILED_TEXT = "Could not connect to network";

/**
 * Number of signal bars for an RSSI, 0 to `levels - 1`
 */
export function calculateSignalLevel(
  rssi: number,
  levels: number = SIGNAL_LEVELS,
): number {
  if (rssi <= SIGNAL_MIN_RSSI) {
    return 0;
  }
  if (rssi >= SIGNAL_MAX_RSSI) {
    return levels - 1;
  }
  const inputRange = SIGNAL_MAX_RSSI - SIGNAL_MIN_RSSI;
  return Math.floor(((rssi - SIGNAL_MIN_RSSI) * (levels - 1)) / inputRange);
}

/**
 * Builds the renderer-independent content of each notification variant
 */
export class NotificationContentBuilder {
  constructor(
    private readonly scores: Pick<IRecommendationProvider, "getCachedScoredNetwork">,
  ) {}

  /**
   * Signal bars and speed badge for the scan of `network`.
   * Null unless the network's exact access point is in the scan and has a
   * cached score.
   */
  createBadge(
    network: SavedNetwork,
    scans: readonly ScanObservation[],
  ): NotificationBadge | null {
    const bssid = network.bssid?.toLowerCase();
    if (bssid === undefined) {
      return null;
    }
    const scan = scans.find(
      (candidate) =>
        candidate.ssid === network.ssid &&
        candidate.bssid.toLowerCase() === bssid,
    );
    if (!scan) {
      return null;
    }

    const key = attempt(() => createScanKey(network.ssid, bssid));
    if (!key.success) {
      return null;
    }
    const scored = this.scores.getCachedScoredNetwork(key.data);
    if (!scored) {
      return null;
    }
    return {
      signalLevel: calculateSignalLevel(scan.rssi),
      badgeLevel: calculateBadge(scored, scan.rssi),
    };
  }

  createMain(network: SavedNetwork, badge: NotificationBadge): NotificationContent {
    return {
      kind: "available",
      title: TITLE,
      text: network.ssid,
      badge,
      actions: ["connect", "options"],
      progress: false,
    };
  }

  createConnecting(
    network: SavedNetwork,
    badge: NotificationBadge | null,
  ): NotificationContent {
    return {
      kind: "connecting",
      title: TITLE,
      text: network.ssid,
      badge,
      actions: [],
      progress: true,
    };
  }

  createConnected(
    network: SavedNetwork,
    badge: NotificationBadge | null,
  ): NotificationContent {
    return {
      kind: "connected",
      title: TITLE,
      text: network.ssid,
      badge,
      actions: [],
      progress: false,
    };
  }

  // The failed variant replaces the network name and drops the badge
  createFailed(): NotificationContent {
    return {
      kind: "failed",
      title: TITLE,
      text: FAILED_TEXT,
      badge: null,
      actions: [],
      progress: false,
    };
  }
}
