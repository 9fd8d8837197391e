import { SavedNetwork, ScanObservation } from "./NetworkTypes";

/**
 * Wi-Fi radio state as reported by the radio subsystem
 */
export enum WifiState {
  DISABLING = "DISABLING",
  DISABLED = "DISABLED",
  ENABLING = "ENABLING",
  ENABLED = "ENABLED",
  UNKNOWN = "UNKNOWN",
}

/**
 * Local access point (hotspot) state
 */
export enum WifiApState {
  DISABLING = "DISABLING",
  DISABLED = "DISABLED",
  ENABLING = "ENABLING",
  ENABLED = "ENABLED",
  FAILED = "FAILED",
  UNKNOWN = "UNKNOWN",
}

/**
 * Fine-grained connection state of the station interface
 */
export enum DetailedState {
  IDLE = "IDLE",
  SCANNING = "SCANNING",
  CONNECTING = "CONNECTING",
  AUTHENTICATING = "AUTHENTICATING",
  OBTAINING_IPADDR = "OBTAINING_IPADDR",
  CONNECTED = "CONNECTED",
  SUSPENDED = "SUSPENDED",
  DISCONNECTING = "DISCONNECTING",
  DISCONNECTED = "DISCONNECTED",
  FAILED = "FAILED",
  BLOCKED = "BLOCKED",
  VERIFYING_POOR_LINK = "VERIFYING_POOR_LINK",
  CAPTIVE_PORTAL_CHECK = "CAPTIVE_PORTAL_CHECK",
}

/**
 * Coarse connection state derived from a DetailedState
 */
export enum NetworkState {
  CONNECTING = "CONNECTING",
  CONNECTED = "CONNECTED",
  SUSPENDED = "SUSPENDED",
  DISCONNECTING = "DISCONNECTING",
  DISCONNECTED = "DISCONNECTED",
  UNKNOWN = "UNKNOWN",
}

const COARSE_STATES: Record<DetailedState, NetworkState> = {
  [DetailedState.IDLE]: NetworkState.DISCONNECTED,
  [DetailedState.SCANNING]: NetworkState.DISCONNECTED,
  [DetailedState.CONNECTING]: NetworkState.CONNECTING,
  [DetailedState.AUTHENTICATING]: NetworkState.CONNECTING,
  [DetailedState.OBTAINING_IPADDR]: NetworkState.CONNECTING,
  [DetailedState.VERIFYING_POOR_LINK]: NetworkState.CONNECTING,
  [DetailedState.CAPTIVE_PORTAL_CHECK]: NetworkState.CONNECTING,
  [DetailedState.CONNECTED]: NetworkState.CONNECTED,
  [DetailedState.SUSPENDED]: NetworkState.SUSPENDED,
  [DetailedState.DISCONNECTING]: NetworkState.DISCONNECTING,
  [DetailedState.DISCONNECTED]: NetworkState.DISCONNECTED,
  [DetailedState.FAILED]: NetworkState.DISCONNECTED,
  [DetailedState.BLOCKED]: NetworkState.DISCONNECTED,
};

/**
 * Map a detailed state onto its coarse state
 */
export function toNetworkState(detailedState: DetailedState): NetworkState {
  return COARSE_STATES[detailedState];
}

/**
 * User settings that gate the state machines
 */
export type RadioSettings = {
  wakeupEnabled: boolean;
  airplaneModeEnabled: boolean;
  notificationEnabled: boolean;
};

/**
 * Actions the user can take on the "network available" notification
 */
export type NotificationAction = "connect" | "deleted";

/**
 * Events consumed by the state machines, in arrival order
 */
export type RadioEvent =
  | { type: "scan_results_available"; scans: ScanObservation[] }
  | { type: "wifi_state_changed"; state: WifiState }
  | { type: "wifi_ap_state_changed"; state: WifiApState }
  | { type: "network_state_changed"; detailedState: DetailedState }
  | { type: "configured_networks_changed"; networks: SavedNetwork[] }
  | { type: "settings_changed"; settings: Partial<RadioSettings> }
  | { type: "notification_action"; action: NotificationAction };
