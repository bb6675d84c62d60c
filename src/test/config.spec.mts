import {
  buildSettings,
  DEFAULT_NAME,
  isValidSubscribeTopic,
  MqttSensorConfigError,
  parsePlatformConfig,
} from "../helpers/index.mts";

function issuesFor(input: unknown) {
  try {
    parsePlatformConfig(input);
  } catch (error) {
    if (error instanceof MqttSensorConfigError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe("Config", () => {
  // #MARK: parsePlatformConfig
  describe("parsePlatformConfig", () => {
    it("applies defaults", () => {
      expect.assertions(1);
      expect(parsePlatformConfig({ state_topic: "test/state" })).toEqual({
        force_update: false,
        name: DEFAULT_NAME,
        payload_available: "online",
        payload_not_available: "offline",
        payload_off: "OFF",
        payload_on: "ON",
        state_topic: "test/state",
      });
    });

    it("coerces numeric strings", () => {
      expect.assertions(2);
      const config = parsePlatformConfig({ off_delay: "5", qos: "1", state_topic: "test/state" });
      expect(config.qos).toBe(1);
      expect(config.off_delay).toBe(5);
    });

    it.each([
      ["yes", true],
      ["On", true],
      ["true", true],
      [1, true],
      ["no", false],
      ["OFF", false],
      ["0", false],
      [0, false],
    ])("reads force_update %s as %s", (force_update, expected) => {
      expect.assertions(1);
      expect(parsePlatformConfig({ force_update, state_topic: "test/state" }).force_update).toBe(
        expected,
      );
    });

    it("truncates off_delay to whole seconds", () => {
      expect.assertions(2);
      expect(parsePlatformConfig({ off_delay: 5.7, state_topic: "test/state" }).off_delay).toBe(5);
      expect(parsePlatformConfig({ off_delay: " 3 ", state_topic: "test/state" }).off_delay).toBe(
        3,
      );
    });

    it("requires a state topic", () => {
      expect.assertions(1);
      expect(issuesFor({ name: "Test" })).toEqual(["state_topic: Required"]);
    });

    it("rejects wildcards that do not fill a level", () => {
      expect.assertions(1);
      expect(issuesFor({ state_topic: "test/state#" })).toEqual(["state_topic: invalid topic"]);
    });

    it.each([
      ["qos", { qos: 3 }],
      ["off_delay", { off_delay: -1 }],
      ["off_delay", { off_delay: null }],
      ["off_delay", { off_delay: "" }],
      ["off_delay", { off_delay: "5.5" }],
      ["device_class", { device_class: "not_a_class" }],
      ["force_update", { force_update: "maybe" }],
      ["force_update", { force_update: null }],
    ])("rejects a bad %s", (key, input) => {
      expect.assertions(1);
      const [issue] = issuesFor({ state_topic: "test/state", ...input });
      expect(issue.startsWith(`${key}: `)).toBe(true);
    });

    it("formats the error message", () => {
      expect.assertions(1);
      expect(() => parsePlatformConfig({})).toThrow(
        "invalid configuration: state_topic: Required",
      );
    });

    it("requires an identifying value for devices", () => {
      expect.assertions(1);
      expect(issuesFor({ device: { name: "Test" }, state_topic: "test/state" })).toEqual([
        "device: Device must have at least one identifying value in 'identifiers' and/or 'connections'",
      ]);
    });

    it("normalizes device identifiers", () => {
      expect.assertions(1);
      const config = parsePlatformConfig({
        device: { identifiers: "test-device" },
        state_topic: "test/state",
      });
      expect(config.device).toEqual({ connections: [], identifiers: ["test-device"] });
    });
  });

  // #MARK: buildSettings
  describe("buildSettings", () => {
    it("falls back to the default qos", () => {
      expect.assertions(2);
      const settings = buildSettings(parsePlatformConfig({ state_topic: "test/state" }), {
        compile: vi.fn(),
        default_qos: 1,
      });
      expect(settings.qos).toBe(1);
      expect(settings.availability).toEqual({
        availability_topic: undefined,
        payload_available: "online",
        payload_not_available: "offline",
        qos: 1,
      });
    });

    it("prefers the sensor qos", () => {
      expect.assertions(1);
      const settings = buildSettings(parsePlatformConfig({ qos: 2, state_topic: "test/state" }), {
        compile: vi.fn(),
        default_qos: 1,
      });
      expect(settings.qos).toBe(2);
    });

    it("compiles the value template", () => {
      expect.assertions(2);
      const template = (payload: string) => payload.toUpperCase();
      const compile = vi.fn(() => template);
      const settings = buildSettings(
        parsePlatformConfig({ state_topic: "test/state", value_template: "{{ value }}" }),
        { compile, default_qos: 0 },
      );
      expect(compile).toHaveBeenCalledWith("{{ value }}");
      expect(settings.value_template).toBe(template);
    });

    it("skips compiling without a template", () => {
      expect.assertions(2);
      const compile = vi.fn();
      const settings = buildSettings(parsePlatformConfig({ state_topic: "test/state" }), {
        compile,
        default_qos: 0,
      });
      expect(compile).not.toHaveBeenCalled();
      expect(settings.value_template).toBeUndefined();
    });
  });

  // #MARK: isValidSubscribeTopic
  describe("isValidSubscribeTopic", () => {
    it.each([
      ["test/state", true],
      ["test/+/state", true],
      ["test/#", true],
      ["#", true],
      ["", false],
      ["test/st+", false],
      ["test/#/state", false],
      ["test/state#", false],
    ])("%s is %s", (topic, expected) => {
      expect.assertions(1);
      expect(isValidSubscribeTopic(topic)).toBe(expected);
    });
  });
});
