import {
  IEventHandler,
  IEventQueue,
  INotifier,
  IRadioController,
  IRecommendationProvider,
  TimerHandle,
} from "@core/interfaces";
import {
  DetailedState,
  NetworkState,
  NotificationAction,
  NotificationBadge,
  NotificationConfig,
  NotificationPhase,
  NotificationStatus,
  RadioEvent,
  SavedNetwork,
  ScanObservation,
  WifiState,
  toNetworkState,
} from "@core/types";
import { OPEN_NETWORK_CAPABILITIES } from "@core/constants";
import { toError } from "@utils/typeGuards";
import { getLogger } from "@utils/logger";
import { NotificationContentBuilder } from "./NotificationContentBuilder";

const logger = getLogger("NotificationStateMachine");

/** Phases in which scans no longer affect the notification */
const CONNECTION_PHASES: ReadonlySet<NotificationPhase> = new Set([
  NotificationPhase.CONNECTING,
  NotificationPhase.CONNECTED,
  NotificationPhase.FAILED,
]);

type Candidate = {
  network: SavedNetwork;
  badge: NotificationBadge;
};

/**
 * Open Network Notification State Machine
 *
 * Offers to join a recommended open network once it has shown up in
 * `scansBeforeShow` consecutive scans while the device is disconnected. The
 * scan count gives the radio a chance to join a saved network on its own
 * before the user is bothered.
 *
 * ```
 * IDLE -> CANDIDATE_PENDING -> SHOWN -> CONNECTING -> CONNECTED -> IDLE
 *                                            \-> FAILED -> IDLE
 * ```
 *
 * Every timer runs on the event queue, so a transition that cancels one timer
 * and schedules the next can not interleave with a timer that already fired.
 */
export class NotificationStateMachine implements IEventHandler {
  readonly name = "NotificationStateMachine";

  private phase: NotificationPhase = NotificationPhase.IDLE;
  private enabled: boolean = false;
  private wifiState: WifiState = WifiState.UNKNOWN;
  private networkState: NetworkState = NetworkState.UNKNOWN;
  private lastDetailedState: DetailedState = DetailedState.IDLE;
  private scansSinceStateChange: number = 0;
  private repeatTime: number = 0;
  private recommended: SavedNetwork | null = null;
  private badge: NotificationBadge | null = null;
  private failureTimer: TimerHandle | null = null;
  private dismissTimer: TimerHandle | null = null;
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly queue: IEventQueue,
    private readonly radio: IRadioController,
    private readonly recommendations: IRecommendationProvider,
    private readonly notifier: INotifier,
    private readonly content: NotificationContentBuilder,
    private readonly config: NotificationConfig,
    private readonly now: () => number = Date.now,
  ) {}

  start(): void {
    if (this.unsubscribe) {
      return;
    }
    this.wifiState = this.radio.getWifiState();
    this.enabled = this.radio.getSettings().notificationEnabled;
    this.networkState = NetworkState.UNKNOWN;
    this.lastDetailedState = DetailedState.IDLE;
    this.unsubscribe = this.queue.subscribe(this);
    logger.info(`Started (wifi=${this.wifiState}, enabled=${this.enabled})`);
  }

  stop(): void {
    if (!this.unsubscribe) {
      return;
    }
    this.unsubscribe();
    this.unsubscribe = null;
    this.reset();
    logger.info("Stopped");
  }

  isStarted(): boolean {
    return this.unsubscribe !== null;
  }

  handleEvent(event: RadioEvent): void {
    switch (event.type) {
      case "wifi_state_changed":
        this.wifiState = event.state;
        this.reset();
        break;
      case "network_state_changed":
        this.onNetworkStateChanged(event.detailedState);
        break;
      case "scan_results_available":
        this.onScanResults(event.scans);
        break;
      case "notification_action":
        this.onAction(event.action);
        break;
      case "settings_changed":
        if (event.settings.notificationEnabled !== undefined) {
          this.enabled = event.settings.notificationEnabled;
          this.reset();
        }
        break;
      default:
        break;
    }
  }

  getStatus(): NotificationStatus {
    return {
      phase: this.phase,
      enabled: this.enabled,
      scansSinceStateChange: this.scansSinceStateChange,
      repeatTime: this.repeatTime,
      recommendedSsid: this.recommended?.ssid ?? null,
    };
  }

  dump(): string[] {
    return [
      `NotificationStateMachine: started=${this.isStarted()} phase=${this.phase}`,
      `  enabled: ${this.enabled}`,
      `  repeatTime: ${this.repeatTime}`,
      `  scansSinceStateChange: ${this.scansSinceStateChange}`,
      `  recommended: ${this.recommended?.ssid ?? "none"}`,
    ];
  }

  private onNetworkStateChanged(detailedState: DetailedState): void {
    this.networkState = toNetworkState(detailedState);
    if (
      detailedState === DetailedState.SCANNING ||
      detailedState === this.lastDetailedState
    ) {
      return;
    }
    this.lastDetailedState = detailedState;
    this.scansSinceStateChange = 0;

    switch (detailedState) {
      case DetailedState.CONNECTED:
        this.onConnected();
        break;
      case DetailedState.DISCONNECTED:
      case DetailedState.CAPTIVE_PORTAL_CHECK:
        this.reset();
        break;
      default:
        break;
    }
  }

  private onScanResults(scans: readonly ScanObservation[]): void {
    if (CONNECTION_PHASES.has(this.phase)) {
      return;
    }

    const candidate = this.findCandidate(scans);
    if (!candidate) {
      this.scansSinceStateChange = 0;
      if (this.phase === NotificationPhase.SHOWN) {
        this.notifier.retract();
        logger.debug("Open network gone, notification retracted");
      }
      this.clearCandidate();
      this.phase = NotificationPhase.IDLE;
      return;
    }

    this.recommended = candidate.network;
    this.badge = candidate.badge;
    this.scansSinceStateChange++;
    if (this.phase === NotificationPhase.IDLE) {
      this.phase = NotificationPhase.CANDIDATE_PENDING;
    }
    if (this.scansSinceStateChange >= this.config.scansBeforeShow) {
      this.showAvailable(candidate);
    }
  }

  /**
   * A scan qualifies when the feature is on, Wi-Fi is on but not connected,
   * and the recommendation engine picks an open network we can badge
   */
  private findCandidate(scans: readonly ScanObservation[]): Candidate | null {
    if (!this.enabled || this.wifiState !== WifiState.ENABLED) {
      return null;
    }
    if (scans.length === 0) {
      return null;
    }
    if (
      this.networkState !== NetworkState.DISCONNECTED &&
      this.networkState !== NetworkState.UNKNOWN
    ) {
      return null;
    }

    const openScans = scans.filter(
      (scan) => scan.capabilities === OPEN_NETWORK_CAPABILITIES,
    );
    if (openScans.length === 0) {
      return null;
    }

    const recommendation = this.recommendations.recommend({
      scans: openScans,
      capabilityFilter: { requireTrusted: false },
    });
    if (!recommendation.success) {
      logger.warn(`Recommendation failed: ${recommendation.error.message}`);
      return null;
    }
    const network = recommendation.data.connect;
    if (!network) {
      return null;
    }

    const badge = this.content.createBadge(network, scans);
    if (!badge) {
      logger.debug(`No badge for ${network.ssid}`);
      return null;
    }
    return { network, badge };
  }

  private showAvailable(candidate: Candidate): void {
    const now = this.now();
    if (now < this.repeatTime) {
      return;
    }
    this.notifier.show(this.content.createMain(candidate.network, candidate.badge));
    this.repeatTime = now + this.config.repeatDelayMs;
    this.phase = NotificationPhase.SHOWN;
    logger.info(`Showing open network ${candidate.network.ssid}`);
  }

  private onAction(action: NotificationAction): void {
    if (action === "deleted") {
      this.dismiss();
      return;
    }
    if (this.phase !== NotificationPhase.SHOWN || !this.recommended) {
      return;
    }

    const network = this.recommended;
    void this.radio
      .connect(network)
      .then((result) => {
        if (!result.success) {
          logger.warn(`Connect to ${network.ssid} failed: ${result.error.message}`);
        }
      })
      .catch((error) => {
        logger.error(`Connect to ${network.ssid} failed: ${toError(error).message}`);
      });

    this.notifier.show(this.content.createConnecting(network, this.badge));
    this.failureTimer = this.queue.schedule(
      this.config.connectingTimeoutMs,
      () => this.onConnectTimeout(),
      "connect-timeout",
    );
    this.phase = NotificationPhase.CONNECTING;
    logger.info(`Connecting to ${network.ssid}`);
  }

  private onConnected(): void {
    if (
      this.phase !== NotificationPhase.SHOWN &&
      this.phase !== NotificationPhase.CONNECTING
    ) {
      return;
    }
    if (this.recommended) {
      this.notifier.show(this.content.createConnected(this.recommended, this.badge));
    }
    this.cancelTimers();
    this.scheduleDismiss();
    this.phase = NotificationPhase.CONNECTED;
  }

  private onConnectTimeout(): void {
    this.failureTimer = null;
    if (this.phase !== NotificationPhase.CONNECTING) {
      return;
    }
    this.notifier.show(this.content.createFailed());
    this.scheduleDismiss();
    this.phase = NotificationPhase.FAILED;
    logger.warn(`Timed out connecting to ${this.recommended?.ssid ?? "network"}`);
  }

  private scheduleDismiss(): void {
    if (this.dismissTimer !== null) {
      this.queue.cancel(this.dismissTimer);
    }
    this.dismissTimer = this.queue.schedule(
      this.config.dismissDelayMs,
      () => {
        this.dismissTimer = null;
        this.dismiss();
      },
      "dismiss",
    );
  }

  /**
   * User dismissal or auto-dismiss
   */
  private dismiss(): void {
    if (this.phase === NotificationPhase.IDLE && !this.recommended) {
      return;
    }
    if (this.isShowing()) {
      this.notifier.retract();
    }
    this.cancelTimers();
    this.clearCandidate();
    this.phase = NotificationPhase.IDLE;
  }

  /**
   * Forget the repeat delay and the scan count and take down anything shown
   */
  private reset(): void {
    this.repeatTime = 0;
    this.scansSinceStateChange = 0;
    this.cancelTimers();
    if (this.isShowing()) {
      this.notifier.retract();
    }
    this.clearCandidate();
    this.phase = NotificationPhase.IDLE;
  }

  private isShowing(): boolean {
    return (
      this.phase === NotificationPhase.SHOWN || CONNECTION_PHASES.has(this.phase)
    );
  }

  private clearCandidate(): void {
    this.recommended = null;
    this.badge = null;
  }

  private cancelTimers(): void {
    if (this.failureTimer !== null) {
      this.queue.cancel(this.failureTimer);
      this.failureTimer = null;
    }
    if (this.dismissTimer !== null) {
      this.queue.cancel(this.dismissTimer);
      this.dismissTimer = null;
    }
  }
}
