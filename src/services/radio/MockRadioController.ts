import { IEventHandler, IEventQueue, IRadioController } from "@core/interfaces";
import {
  DetailedState,
  RadioEvent,
  RadioSettings,
  Result,
  SavedNetwork,
  WifiApState,
  WifiState,
  failure,
  success,
} from "@core/types";
import { RadioError } from "@core/errors";
import { getLogger } from "@utils/logger";

const logger = getLogger("MockRadioController");

export type MockRadioOptions = {
  settings: RadioSettings;
  networks?: SavedNetwork[];
  wifiState?: WifiState;
  apState?: WifiApState;
};

/**
 * In-memory radio for standalone runs and tests.
 *
 * Mirrors every radio event dispatched on the queue, so state injected through
 * the diagnostics API is what the state machines see on start-up. Actions
 * complete immediately by dispatching the events a real radio would send.
 */
export class MockRadioController implements IRadioController, IEventHandler {
  readonly name = "MockRadioController";

  private wifiState: WifiState;
  private apState: WifiApState;
  private settings: RadioSettings;
  private networks: SavedNetwork[];
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly queue: IEventQueue,
    options: MockRadioOptions,
  ) {
    this.wifiState = options.wifiState ?? WifiState.ENABLED;
    this.apState = options.apState ?? WifiApState.DISABLED;
    this.settings = { ...options.settings };
    this.networks = [...(options.networks ?? [])];
    logger.info("Mock radio created (no hardware access)");
  }

  start(): void {
    if (!this.unsubscribe) {
      this.unsubscribe = this.queue.subscribe(this);
    }
  }

  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
  }

  handleEvent(event: RadioEvent): void {
    switch (event.type) {
      case "wifi_state_changed":
        this.wifiState = event.state;
        break;
      case "wifi_ap_state_changed":
        this.apState = event.state;
        break;
      case "configured_networks_changed":
        this.networks = [...event.networks];
        break;
      case "settings_changed":
        this.settings = { ...this.settings, ...event.settings };
        break;
      default:
        break;
    }
  }

  getConfiguredNetworks(): SavedNetwork[] {
    return [...this.networks];
  }

  getWifiState(): WifiState {
    return this.wifiState;
  }

  getApState(): WifiApState {
    return this.apState;
  }

  getSettings(): RadioSettings {
    return { ...this.settings };
  }

  async setWifiEnabled(enabled: boolean): Promise<Result<void>> {
    if (enabled && this.settings.airplaneModeEnabled) {
      return failure(RadioError.airplaneMode());
    }

    const target = enabled ? WifiState.ENABLED : WifiState.DISABLED;
    if (this.wifiState === target) {
      return success(undefined);
    }

    logger.info(`Mock: turning Wi-Fi ${enabled ? "on" : "off"}`);
    this.queue.dispatch({
      type: "wifi_state_changed",
      state: enabled ? WifiState.ENABLING : WifiState.DISABLING,
    });
    this.queue.dispatch({ type: "wifi_state_changed", state: target });
    return success(undefined);
  }

  async connect(network: SavedNetwork): Promise<Result<void>> {
    if (this.wifiState !== WifiState.ENABLED) {
      return failure(RadioError.connectFailed(network.ssid, "Wi-Fi is off"));
    }

    logger.info(`Mock: connecting to "${network.ssid}"`);
    this.queue.dispatch({
      type: "network_state_changed",
      detailedState: DetailedState.CONNECTING,
    });
    this.queue.dispatch({
      type: "network_state_changed",
      detailedState: DetailedState.CONNECTED,
    });
    return success(undefined);
  }
}
