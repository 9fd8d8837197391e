import { SavedNetwork, ScanObservation } from "../types";

/**
 * Picks the saved network worth waking the radio for
 */
export interface INetworkSelector {
  /**
   * @param savedNetworks Eligible saved networks keyed by unquoted SSID
   * @returns The best candidate, or null when no scan qualifies
   */
  selectNetwork(
    savedNetworks: ReadonlyMap<string, SavedNetwork>,
    scans: readonly ScanObservation[],
  ): SavedNetwork | null;
}
