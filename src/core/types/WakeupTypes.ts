/**
 * Whether the wakeup machine may turn the radio on
 */
export enum WakeupPhase {
  /** Radio is on, or was turned on by the wakeup machine */
  ARMED = "ARMED",
  /** User turned the radio off; waiting for them to leave and come back */
  DISARMED = "DISARMED",
}

/**
 * Snapshot for status output
 */
export type WakeupStatus = {
  phase: WakeupPhase;
  enabled: boolean;
  savedSsids: string[];
  savedSsidsInLastScan: string[];
  /** SSID -> scans left before it is considered gone */
  tracked: Record<string, number>;
};
