import { NetworkKey, ScoredNetwork } from "../types";

/**
 * Score Store Interface
 *
 * Holds one score per exact network key plus an optional wildcard score per
 * SSID. Entries are replaced, never mutated, and live for the lifetime of the
 * process.
 */
export interface IScoreStore {
  /**
   * Insert or replace the entry stored under `network.networkKey`
   */
  put(network: ScoredNetwork): void;

  /**
   * Exact match first, then the wildcard entry of the same SSID
   * @returns The stored entry, whose key tells which of the two matched
   */
  get(key: NetworkKey): ScoredNetwork | undefined;

  /**
   * Number of stored entries, wildcard entries included
   */
  size(): number;

  /**
   * Snapshot of every stored entry
   */
  entries(): ScoredNetwork[];
}
