import {
  IEventHandler,
  IEventQueue,
  INetworkSelector,
  IRadioController,
} from "@core/interfaces";
import {
  RadioEvent,
  RadioSettings,
  SavedNetwork,
  ScanObservation,
  WakeupConfig,
  WakeupPhase,
  WakeupStatus,
  WifiApState,
  WifiState,
} from "@core/types";
import { toError } from "@utils/typeGuards";
import { getLogger } from "@utils/logger";

const logger = getLogger("WakeupStateMachine");

/**
 * Saved networks the machine may wake the radio for
 */
function isEligible(network: SavedNetwork): boolean {
  return (
    network.enabled &&
    !network.useExternalScores &&
    !network.hasNoInternetAccess &&
    !network.noInternetAccessExpected &&
    network.ssid.length > 0
  );
}

/**
 * Wi-Fi Wakeup State Machine
 *
 * Turns the radio back on when the user returns to a saved network after
 * having turned Wi-Fi off. Networks that were in range when Wi-Fi went off are
 * tracked until they have been missing from `missedScansBeforeRelease`
 * consecutive scans, so the radio is not re-enabled next to the network the
 * user just turned it off at.
 */
export class WakeupStateMachine implements IEventHandler {
  readonly name = "WakeupStateMachine";

  private readonly savedNetworks = new Map<string, SavedNetwork>();
  private readonly savedSsidsInLastScan = new Set<string>();
  /** SSID -> scans left before the network counts as gone */
  private readonly tracked = new Map<string, number>();

  private phase: WakeupPhase = WakeupPhase.ARMED;
  private wifiState: WifiState = WifiState.UNKNOWN;
  private apState: WifiApState = WifiApState.UNKNOWN;
  private settings: RadioSettings = {
    wakeupEnabled: false,
    airplaneModeEnabled: false,
    notificationEnabled: false,
  };
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly queue: IEventQueue,
    private readonly radio: IRadioController,
    private readonly selector: INetworkSelector,
    private readonly config: WakeupConfig,
  ) {}

  /**
   * Seed state from the radio controller and start consuming events.
   * Calling it twice has no effect.
   */
  start(): void {
    if (this.unsubscribe) {
      return;
    }
    this.wifiState = this.radio.getWifiState();
    this.apState = this.radio.getApState();
    this.settings = { ...this.radio.getSettings() };
    this.phase =
      this.wifiState === WifiState.DISABLED
        ? WakeupPhase.DISARMED
        : WakeupPhase.ARMED;
    this.updateSavedNetworks(this.radio.getConfiguredNetworks());
    this.unsubscribe = this.queue.subscribe(this);
    logger.info(
      `Started (wifi=${this.wifiState}, wakeup=${this.settings.wakeupEnabled}, ${this.savedNetworks.size} eligible network(s))`,
    );
  }

  stop(): void {
    if (!this.unsubscribe) {
      return;
    }
    this.unsubscribe();
    this.unsubscribe = null;
    logger.info("Stopped");
  }

  isStarted(): boolean {
    return this.unsubscribe !== null;
  }

  handleEvent(event: RadioEvent): void {
    switch (event.type) {
      case "wifi_state_changed":
        this.onWifiStateChanged(event.state);
        break;
      case "wifi_ap_state_changed":
        this.apState = event.state;
        break;
      case "scan_results_available":
        this.onScanResults(event.scans);
        break;
      case "configured_networks_changed":
        this.updateSavedNetworks(event.networks);
        break;
      case "settings_changed":
        this.settings = { ...this.settings, ...event.settings };
        break;
      default:
        break;
    }
  }

  getStatus(): WakeupStatus {
    return {
      phase: this.phase,
      enabled: this.settings.wakeupEnabled,
      savedSsids: [...this.savedNetworks.keys()],
      savedSsidsInLastScan: [...this.savedSsidsInLastScan],
      tracked: Object.fromEntries(this.tracked),
    };
  }

  dump(): string[] {
    const status = this.getStatus();
    return [
      `WakeupStateMachine: started=${this.isStarted()} phase=${status.phase}`,
      `  wakeupEnabled: ${status.enabled}`,
      `  savedSsids: [${status.savedSsids.join(", ")}]`,
      `  savedSsidsInLastScan: [${status.savedSsidsInLastScan.join(", ")}]`,
      `  tracked: {${Object.entries(status.tracked)
        .map(([ssid, remaining]) => `${ssid}=${remaining}`)
        .join(", ")}}`,
    ];
  }

  private onWifiStateChanged(state: WifiState): void {
    this.wifiState = state;
    if (state === WifiState.ENABLED) {
      this.tracked.clear();
      this.phase = WakeupPhase.ARMED;
    } else if (state === WifiState.DISABLED) {
      for (const ssid of this.savedSsidsInLastScan) {
        this.tracked.set(ssid, this.config.missedScansBeforeRelease);
      }
      this.phase = WakeupPhase.DISARMED;
      logger.debug(`Wi-Fi disabled near ${this.tracked.size} saved network(s)`);
    }
  }

  private onScanResults(scans: readonly ScanObservation[]): void {
    this.savedSsidsInLastScan.clear();
    for (const scan of scans) {
      if (this.savedNetworks.has(scan.ssid)) {
        this.savedSsidsInLastScan.add(scan.ssid);
      }
    }

    if (
      this.settings.airplaneModeEnabled ||
      !this.settings.wakeupEnabled ||
      this.wifiState !== WifiState.DISABLED ||
      this.apState !== WifiApState.DISABLED
    ) {
      return;
    }

    for (const [ssid, remaining] of [...this.tracked]) {
      if (this.savedSsidsInLastScan.has(ssid)) {
        this.tracked.set(ssid, this.config.missedScansBeforeRelease);
      } else if (remaining > 1) {
        this.tracked.set(ssid, remaining - 1);
      } else {
        this.tracked.delete(ssid);
      }
    }

    if (this.tracked.size > 0) {
      logger.debug(
        `Still near network(s) Wi-Fi was disabled at: ${[...this.tracked.keys()].join(", ")}`,
      );
      return;
    }

    const selected = this.selector.selectNetwork(this.savedNetworks, scans);
    if (!selected) {
      return;
    }

    logger.info(`Enabling Wi-Fi for ${selected.ssid}`);
    this.phase = WakeupPhase.ARMED;
    void this.radio
      .setWifiEnabled(true)
      .then((result) => {
        if (!result.success) {
          logger.warn(`Could not enable Wi-Fi: ${result.error.message}`);
        }
      })
      .catch((error) => {
        logger.error(`Could not enable Wi-Fi: ${toError(error).message}`);
      });
  }

  private updateSavedNetworks(networks: readonly SavedNetwork[]): void {
    this.savedNetworks.clear();
    for (const network of networks) {
      if (isEligible(network)) {
        this.savedNetworks.set(network.ssid, network);
      }
    }
    for (const ssid of [...this.savedSsidsInLastScan]) {
      if (!this.savedNetworks.has(ssid)) {
        this.savedSsidsInLastScan.delete(ssid);
      }
    }
    for (const ssid of [...this.tracked.keys()]) {
      if (!this.savedNetworks.has(ssid)) {
        this.tracked.delete(ssid);
      }
    }
  }
}
