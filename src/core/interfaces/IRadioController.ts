import {
  RadioSettings,
  Result,
  SavedNetwork,
  WifiApState,
  WifiState,
} from "../types";

/**
 * Read access to the user's saved Wi-Fi configurations
 */
export interface ISavedNetworkSource {
  getConfiguredNetworks(): SavedNetwork[];
}

/**
 * Radio Controller Interface
 *
 * The platform side of the radio: current state snapshots for start-up and the
 * two actions the state machines may request. Changes after start-up arrive as
 * events on the event queue, not through this interface.
 */
export interface IRadioController extends ISavedNetworkSource {
  getWifiState(): WifiState;

  getApState(): WifiApState;

  getSettings(): RadioSettings;

  /**
   * Turn the Wi-Fi radio on or off.
   * Completion is reported later through a wifi_state_changed event.
   */
  setWifiEnabled(enabled: boolean): Promise<Result<void>>;

  /**
   * Connect to a network. Progress is reported through network_state_changed
   * events.
   */
  connect(network: SavedNetwork): Promise<Result<void>>;
}
