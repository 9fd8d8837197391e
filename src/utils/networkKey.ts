import { NetworkKey, SecurityType } from "@core/types";
import { ScoreError } from "@core/errors";
import {
  BAND_24GHZ_END_MHZ,
  BAND_24GHZ_START_MHZ,
  BAND_5GHZ_END_MHZ,
  BAND_5GHZ_START_MHZ,
  WILDCARD_BSSID,
  WILDCARD_BSSID_ALIAS,
} from "@core/constants";

const QUOTED_SSID = /^"(.*)"$/;
const HEX_SSID = /^0x[0-9a-fA-F]+$/;
const BSSID = /^([0-9a-fA-F]{2}:){5}[0-9a-fA-F]{2}$/;

export function quoteSsid(ssid: string): string {
  return `"${ssid}"`;
}

/**
 * Strip the quotes from a key SSID. Hex SSIDs are returned unchanged.
 */
export function unquoteSsid(ssid: string): string {
  const match = QUOTED_SSID.exec(ssid);
  return match ? match[1] : ssid;
}

function isValidKeySsid(ssid: string): boolean {
  return QUOTED_SSID.test(ssid) || HEX_SSID.test(ssid);
}

function isValidBssid(bssid: string): boolean {
  return BSSID.test(bssid);
}

/**
 * Build a network key, validating both parts.
 * `any` is accepted for the wildcard BSSID; BSSIDs are stored lower-case.
 *
 * @throws ScoreError with code SCORE_INVALID_ARGUMENT
 */
export function createNetworkKey(ssid: string, bssid: string): NetworkKey {
  if (!isValidKeySsid(ssid)) {
    throw ScoreError.invalidArgument("ssid", ssid);
  }
  if (bssid.toLowerCase() === WILDCARD_BSSID_ALIAS) {
    return { ssid, bssid: WILDCARD_BSSID };
  }
  if (!isValidBssid(bssid)) {
    throw ScoreError.invalidArgument("bssid", bssid);
  }
  return { ssid, bssid: bssid.toLowerCase() };
}

/**
 * Key for an access point seen in a scan (whose SSID is unquoted)
 */
export function createScanKey(ssid: string, bssid: string): NetworkKey {
  return createNetworkKey(quoteSsid(ssid), bssid);
}

export function isWildcardKey(key: NetworkKey): boolean {
  return key.bssid === WILDCARD_BSSID;
}

export function formatNetworkKey(key: NetworkKey): string {
  return `${key.ssid},${key.bssid}`;
}

export function is24GHz(frequency: number): boolean {
  return frequency >= BAND_24GHZ_START_MHZ && frequency <= BAND_24GHZ_END_MHZ;
}

export function is5GHz(frequency: number): boolean {
  return frequency >= BAND_5GHZ_START_MHZ && frequency <= BAND_5GHZ_END_MHZ;
}

/**
 * Security advertised in a scan capability string, e.g. "[WPA2-PSK-CCMP][ESS]"
 */
export function securityFromCapabilities(capabilities: string): SecurityType {
  if (capabilities.includes("PSK")) return "psk";
  if (capabilities.includes("EAP")) return "eap";
  if (capabilities.includes("WEP")) return "wep";
  return "open";
}
