/**
 * Identity of a scored network.
 *
 * `ssid` is always in the quoted form (`"MyNetwork"`) or the hex form (`0x4d79`),
 * which is how scores are keyed. Scan observations and saved networks carry the
 * unquoted SSID instead; use `quoteSsid` / `unquoteSsid` to move between the two.
 */
export type NetworkKey = {
  readonly ssid: string;
  readonly bssid: string;
};

/**
 * Step function from RSSI to score.
 * Bucket `i` covers `[start + i * bucketWidth, start + (i + 1) * bucketWidth)`.
 */
export type ScoreCurve = {
  /** RSSI (dBm) where the first bucket begins */
  readonly start: number;
  /** Width of every bucket in dB */
  readonly bucketWidth: number;
  /** Signed byte samples, one per bucket */
  readonly buckets: readonly number[];
};

/**
 * Qualitative connection speed badge. Values match the samples stored in
 * a badge curve.
 */
export enum BadgeLevel {
  NONE = 0,
  SD = 10,
  HD = 20,
  UHD_4K = 30,
}

/**
 * A score entry for one network (or every access point of an SSID, when the
 * key carries the wildcard BSSID).
 */
export type ScoredNetwork = {
  readonly networkKey: NetworkKey;
  readonly curve: ScoreCurve;
  readonly meteredHint: boolean;
  readonly hasCaptivePortal: boolean;
  readonly badgeLevel: BadgeLevel;
  /** Only set when the badge level is not NONE */
  readonly badgeCurve?: ScoreCurve;
};

/**
 * Security of a network as configured by the user or advertised in a scan
 */
export type SecurityType = "open" | "wep" | "psk" | "eap";

/**
 * A user-configured network. Supplied by the radio controller; the core only
 * reads it.
 */
export type SavedNetwork = {
  /** Unquoted SSID */
  readonly ssid: string;
  readonly bssid?: string;
  readonly security: SecurityType;
  /** Passpoint (Hotspot 2.0) profile */
  readonly passpoint: boolean;
  readonly enabled: boolean;
  /** Scored by an external scorer rather than by this service */
  readonly useExternalScores: boolean;
  /** The network was validated and found to have no internet access */
  readonly hasNoInternetAccess: boolean;
  /** The user accepted that this network has no internet access */
  readonly noInternetAccessExpected: boolean;
  readonly meteredHint?: boolean;
  /** Synthesized from a score rather than saved by the user */
  readonly ephemeral?: boolean;
};

/**
 * One access point seen in a scan cycle
 */
export type ScanObservation = {
  /** Unquoted SSID */
  readonly ssid: string;
  readonly bssid: string;
  /** dBm */
  readonly rssi: number;
  /** MHz */
  readonly frequency: number;
  /** Capability string as reported by the driver, e.g. "[WPA2-PSK-CCMP][ESS]" */
  readonly capabilities: string;
};

/**
 * Which scans a recommendation may pick from
 */
export type CapabilityFilter = {
  /** Only recommend networks the user has saved */
  readonly requireTrusted: boolean;
};

export type RecommendationRequest = {
  readonly scans: readonly ScanObservation[];
  readonly capabilityFilter: CapabilityFilter;
  readonly currentConfig?: SavedNetwork | null;
};

export type Recommendation = {
  /** Network to connect to, or null for "do not connect" */
  readonly connect: SavedNetwork | null;
};
