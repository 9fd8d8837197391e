import {
  DetailedState,
  RadioEvent,
  SavedNetwork,
  WifiApState,
  WifiState,
} from "@core/types";
import { RadioErrorCode } from "@core/errors";
import { EventQueue } from "@services/events/EventQueue";
import { MockRadioController } from "../MockRadioController";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  }),
}));

const HOME: SavedNetwork = {
  ssid: "Home",
  security: "psk",
  passpoint: false,
  enabled: true,
  useExternalScores: false,
  hasNoInternetAccess: false,
  noInternetAccessExpected: false,
};

describe("MockRadioController", () => {
  let queue: EventQueue;
  let radio: MockRadioController;
  let seen: RadioEvent[];

  beforeEach(() => {
    queue = new EventQueue();
    radio = new MockRadioController(queue, {
      settings: {
        wakeupEnabled: true,
        airplaneModeEnabled: false,
        notificationEnabled: true,
      },
      networks: [HOME],
    });
    radio.start();
    seen = [];
    queue.subscribe({ name: "recorder", handleEvent: (event) => seen.push(event) });
  });

  afterEach(() => {
    radio.stop();
    queue.dispose();
  });

  it("should start with Wi-Fi on and the access point off", () => {
    expect(radio.getWifiState()).toBe(WifiState.ENABLED);
    expect(radio.getApState()).toBe(WifiApState.DISABLED);
    expect(radio.getConfiguredNetworks()).toEqual([HOME]);
  });

  it("should mirror dispatched events", () => {
    queue.dispatch({ type: "wifi_state_changed", state: WifiState.DISABLED });
    queue.dispatch({ type: "wifi_ap_state_changed", state: WifiApState.ENABLED });
    queue.dispatch({ type: "configured_networks_changed", networks: [] });
    queue.dispatch({ type: "settings_changed", settings: { wakeupEnabled: false } });

    expect(radio.getWifiState()).toBe(WifiState.DISABLED);
    expect(radio.getApState()).toBe(WifiApState.ENABLED);
    expect(radio.getConfiguredNetworks()).toEqual([]);
    expect(radio.getSettings()).toEqual({
      wakeupEnabled: false,
      airplaneModeEnabled: false,
      notificationEnabled: true,
    });
  });

  describe("setWifiEnabled", () => {
    it("should report the transition through events", async () => {
      const result = await radio.setWifiEnabled(false);

      expect(result.success).toBe(true);
      expect(seen).toEqual([
        { type: "wifi_state_changed", state: WifiState.DISABLING },
        { type: "wifi_state_changed", state: WifiState.DISABLED },
      ]);
      expect(radio.getWifiState()).toBe(WifiState.DISABLED);
    });

    it("should do nothing when already in the requested state", async () => {
      await radio.setWifiEnabled(true);

      expect(seen).toEqual([]);
    });

    it("should refuse to enable in airplane mode", async () => {
      queue.dispatch({ type: "wifi_state_changed", state: WifiState.DISABLED });
      queue.dispatch({
        type: "settings_changed",
        settings: { airplaneModeEnabled: true },
      });

      const result = await radio.setWifiEnabled(true);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toMatchObject({ code: RadioErrorCode.AIRPLANE_MODE });
      }
      expect(radio.getWifiState()).toBe(WifiState.DISABLED);
    });
  });

  describe("connect", () => {
    it("should report the connection through events", async () => {
      await radio.connect(HOME);

      expect(seen).toEqual([
        { type: "network_state_changed", detailedState: DetailedState.CONNECTING },
        { type: "network_state_changed", detailedState: DetailedState.CONNECTED },
      ]);
    });

    it("should fail while Wi-Fi is off", async () => {
      queue.dispatch({ type: "wifi_state_changed", state: WifiState.DISABLED });

      const result = await radio.connect(HOME);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe("Failed to connect to Home: Wi-Fi is off");
      }
    });
  });
});
