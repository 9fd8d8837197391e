/**
 * Default Configuration Constants
 *
 * All default values used throughout the application, grouped by domain.
 * RSSI values are in dBm, durations in milliseconds.
 */

// =============================================================================
// Score Defaults
// =============================================================================

/**
 * BSSID used for score entries that apply to every access point of an SSID
 */
export const WILDCARD_BSSID = "00:00:00:00:00:00";

/**
 * Alias for the wildcard BSSID accepted by the score line protocol
 */
export const WILDCARD_BSSID_ALIAS = "any";

/**
 * RSSI where curves parsed from the line protocol begin.
 * Low enough that every real reading falls inside or above the first bucket.
 */
export const SCORE_CONSTANT_CURVE_START = -150;

/**
 * Bucket width of a constant (single bucket) curve
 */
export const SCORE_CONSTANT_CURVE_WIDTH = 1;

/**
 * Range of a curve sample (signed byte)
 */
export const SCORE_SAMPLE_MIN = -128;
export const SCORE_SAMPLE_MAX = 127;

// =============================================================================
// Selector Defaults
// =============================================================================

export const SELECTOR_DEFAULT_THRESHOLD_QUALIFIED_RSSI_24 = -73;
export const SELECTOR_DEFAULT_THRESHOLD_QUALIFIED_RSSI_5 = -70;

/**
 * Signals stronger than this score the same
 */
export const SELECTOR_DEFAULT_THRESHOLD_SATURATED_RSSI_24 = -60;

export const SELECTOR_DEFAULT_RSSI_SCORE_SLOPE = 4;
export const SELECTOR_DEFAULT_RSSI_SCORE_OFFSET = 85;
export const SELECTOR_DEFAULT_BAND_5GHZ_AWARD = 40;
export const SELECTOR_DEFAULT_PASSPOINT_SECURITY_AWARD = 40;
export const SELECTOR_DEFAULT_SECURITY_AWARD = 80;

// =============================================================================
// Band Limits
// =============================================================================

export const BAND_24GHZ_START_MHZ = 2400;
export const BAND_24GHZ_END_MHZ = 2500;
export const BAND_5GHZ_START_MHZ = 4900;
export const BAND_5GHZ_END_MHZ = 5900;

// =============================================================================
// Wakeup Defaults
// =============================================================================

export const WAKEUP_DEFAULT_ENABLED = true;

/**
 * Scans a network seen when Wi-Fi was turned off must be missing before the
 * radio may be turned back on
 */
export const WAKEUP_DEFAULT_MISSED_SCANS_BEFORE_RELEASE = 3;

// =============================================================================
// Notification Defaults
// =============================================================================

export const NOTIFICATION_DEFAULT_ENABLED = true;

/**
 * Consecutive qualifying scans before "network available" is shown
 */
export const NOTIFICATION_DEFAULT_SCANS_BEFORE_SHOW = 3;

/**
 * 15 minutes between two "network available" notifications
 */
export const NOTIFICATION_DEFAULT_REPEAT_DELAY_MS = 900_000;

export const NOTIFICATION_DEFAULT_CONNECTING_TIMEOUT_MS = 10_000;
export const NOTIFICATION_DEFAULT_DISMISS_DELAY_MS = 5_000;

/**
 * Signal bar calculation: number of levels and the RSSI range they span
 */
export const SIGNAL_LEVELS = 5;
export const SIGNAL_MIN_RSSI = -100;
export const SIGNAL_MAX_RSSI = -55;

/**
 * Capability string of an open network as reported in scan results
 */
export const OPEN_NETWORK_CAPABILITIES = "[ESS]";

// =============================================================================
// Web Defaults
// =============================================================================

export const WEB_DEFAULT_ENABLED = true;
export const WEB_DEFAULT_PORT = 3000;
export const WEB_DEFAULT_HOST = "0.0.0.0";
export const WEB_DEFAULT_API_BASE_PATH = "/api";

/**
 * Upper bound on JSON request bodies
 */
export const WEB_MAX_BODY_SIZE = "1mb";

// =============================================================================
// Application Defaults
// =============================================================================

export const DEFAULT_CONFIG_PATH = "./config/default.json";
export const DEFAULT_LOG_LEVEL = "info";
