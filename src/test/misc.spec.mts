import { DeviceInfoHolder, formatObjectId, hashKey, toQoS } from "../helpers/index.mts";
import { expandDiscoveryPayload, parseDiscoveryTopic } from "../services/index.mts";

describe("Misc", () => {
  // #MARK: formatObjectId
  describe("formatObjectId", () => {
    it("should lowercase and join words", () => {
      expect(formatObjectId("Hallway Motion")).toBe("hallway_motion");
    });

    it("should strip and collapse separators", () => {
      expect(formatObjectId("  Front--Door!! ")).toBe("front_door");
      expect(formatObjectId("__a__b__")).toBe("a_b");
    });

    it("should return an empty string for symbols only", () => {
      expect(formatObjectId("!!!")).toBe("");
    });
  });

  // #MARK: toQoS
  describe("toQoS", () => {
    it("should keep valid levels", () => {
      expect(toQoS(1)).toBe(1);
      expect(toQoS(2)).toBe(2);
    });

    it("should fall back to 0", () => {
      expect(toQoS(5)).toBe(0);
    });
  });

  // #MARK: hashKey
  describe("hashKey", () => {
    it("should join component and discovery id", () => {
      expect(hashKey(["binary_sensor", "node door"])).toBe("binary_sensor:node door");
    });
  });

  // #MARK: DeviceInfoHolder
  describe("DeviceInfoHolder", () => {
    it("should prefix identifiers with the domain", () => {
      const holder = new DeviceInfoHolder({
        connections: [["mac", "00:00:00:00:00:01"]],
        identifiers: ["test-device"],
        model: "T1",
      });
      expect(holder.device_info).toEqual({
        connections: [["mac", "00:00:00:00:00:01"]],
        identifiers: [["mqtt", "test-device"]],
        model: "T1",
      });
    });

    it("should follow updates", () => {
      const holder = new DeviceInfoHolder(undefined);
      expect(holder.device_info).toBeUndefined();
      holder.update({ connections: [], identifiers: ["test-device"], sw_version: "1.0" });
      expect(holder.device_info).toEqual({
        connections: [],
        identifiers: [["mqtt", "test-device"]],
        sw_version: "1.0",
      });
    });
  });

  // #MARK: parseDiscoveryTopic
  describe("parseDiscoveryTopic", () => {
    it("should read the object id", () => {
      const topic = "homeassistant/binary_sensor/door/config";
      expect(parseDiscoveryTopic("homeassistant", topic)).toEqual(["binary_sensor", "door"]);
    });

    it("should join node and object id", () => {
      expect(
        parseDiscoveryTopic("homeassistant", "homeassistant/binary_sensor/node-1/door/config"),
      ).toEqual(["binary_sensor", "node-1 door"]);
    });

    it.each([
      "other/binary_sensor/door/config",
      "homeassistant/binary_sensor/door/state",
      "homeassistant/binary_sensor/do.or/config",
      "homeassistant/binary_sensor/a/b/c/config",
      "homeassistant/config",
    ])("should ignore %s", topic => {
      expect(parseDiscoveryTopic("homeassistant", topic)).toBeUndefined();
    });
  });

  // #MARK: expandDiscoveryPayload
  describe("expandDiscoveryPayload", () => {
    it("should expand abbreviations", () => {
      expect(
        expandDiscoveryPayload({
          dev: { ids: "test-device", mf: "Test Co" },
          dev_cla: "door",
          name: "Garage",
          pl_on: "open",
          stat_t: "home/garage/state",
        }),
      ).toEqual({
        device: { identifiers: "test-device", manufacturer: "Test Co" },
        device_class: "door",
        name: "Garage",
        payload_on: "open",
        state_topic: "home/garage/state",
      });
    });

    it("should substitute the base topic", () => {
      expect(
        expandDiscoveryPayload({
          "avty_t": "status/~",
          "name": "~/not-a-topic",
          "stat_t": "~/state",
          "~": "home/garage",
        }),
      ).toEqual({
        availability_topic: "status/home/garage",
        name: "~/not-a-topic",
        state_topic: "home/garage/state",
      });
    });

    it("should leave ~ alone without a base", () => {
      expect(expandDiscoveryPayload({ stat_t: "~/state" })).toEqual({ state_topic: "~/state" });
    });
  });
});
