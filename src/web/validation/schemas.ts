/**
 * API Request Validation Schemas
 *
 * Zod schemas for the diagnostics API request bodies.
 */

import { z } from "zod";
import { DetailedState, WifiApState, WifiState } from "@core/types";

// ============================================================================
// Common Schemas
// ============================================================================

/**
 * Colon-separated MAC address
 */
export const bssidSchema = z
  .string({ message: "bssid must be a string" })
  .regex(
    /^([0-9a-fA-F]{2}:){5}[0-9a-fA-F]{2}$/,
    "bssid must look like aa:bb:cc:dd:ee:ff",
  );

/**
 * One access point from a scan
 */
export const scanObservationSchema = z.object({
  ssid: z.string(),
  bssid: bssidSchema,
  rssi: z.number().int().min(-127).max(0),
  frequency: z.number().int().positive(),
  capabilities: z.string().default(""),
});

/**
 * A saved network. Flags the caller leaves out take the values of an
 * ordinary user-added network.
 */
export const savedNetworkSchema = z.object({
  ssid: z.string().min(1, "ssid is required"),
  bssid: bssidSchema.optional(),
  security: z.enum(["open", "wep", "psk", "eap"]),
  passpoint: z.boolean().default(false),
  enabled: z.boolean().default(true),
  useExternalScores: z.boolean().default(false),
  hasNoInternetAccess: z.boolean().default(false),
  noInternetAccessExpected: z.boolean().default(false),
  meteredHint: z.boolean().optional(),
  ephemeral: z.boolean().optional(),
});

// ============================================================================
// Score Controller Schemas
// ============================================================================

/**
 * Add one score in the line protocol
 */
export const addScoreSchema = z.object({
  line: z.string().min(1, "line is required"),
});

/**
 * Ask for the stored scores of some networks. Keys use the stored SSID form
 * (quoted or hex).
 */
export const requestScoresSchema = z.object({
  keys: z.array(
    z.object({
      ssid: z.string().min(1, "ssid is required"),
      bssid: z.string().min(1, "bssid is required"),
    }),
  ),
});

/**
 * Ask for a recommendation among scans
 */
export const recommendationRequestSchema = z.object({
  scans: z.array(scanObservationSchema),
  requireTrusted: z.boolean().default(false),
  currentConfig: savedNetworkSchema.nullable().optional(),
});

// ============================================================================
// Event Controller Schemas
// ============================================================================

/**
 * Any radio event the state machines consume
 */
export const radioEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("scan_results_available"),
    scans: z.array(scanObservationSchema),
  }),
  z.object({
    type: z.literal("wifi_state_changed"),
    state: z.nativeEnum(WifiState),
  }),
  z.object({
    type: z.literal("wifi_ap_state_changed"),
    state: z.nativeEnum(WifiApState),
  }),
  z.object({
    type: z.literal("network_state_changed"),
    detailedState: z.nativeEnum(DetailedState),
  }),
  z.object({
    type: z.literal("configured_networks_changed"),
    networks: z.array(savedNetworkSchema),
  }),
  z.object({
    type: z.literal("settings_changed"),
    settings: z
      .object({
        wakeupEnabled: z.boolean().optional(),
        airplaneModeEnabled: z.boolean().optional(),
        notificationEnabled: z.boolean().optional(),
      })
      .strict(),
  }),
  z.object({
    type: z.literal("notification_action"),
    action: z.enum(["connect", "deleted"]),
  }),
]);

// ============================================================================
// Type Exports
// ============================================================================

export type AddScoreInput = z.infer<typeof addScoreSchema>;
export type RequestScoresInput = z.infer<typeof requestScoresSchema>;
export type RecommendationRequestInput = z.infer<
  typeof recommendationRequestSchema
>;
export type RadioEventInput = z.infer<typeof radioEventSchema>;
