import { compileValueTemplate, MqttSensorTemplateError } from "../helpers/index.mts";

function setup() {
  const logger = { debug: vi.fn(), error: vi.fn(), info: vi.fn(), trace: vi.fn(), warn: vi.fn() };
  const states = (entity_id: string) => (entity_id === "binary_sensor.door" ? "on" : undefined);
  const render = (source: string, payload: string) =>
    compileValueTemplate(source, { logger, states })(payload);
  return { logger, render };
}

describe("compileValueTemplate", () => {
  // #MARK: variables
  describe("variables", () => {
    it("reads json attributes", () => {
      expect.assertions(1);
      const { render } = setup();
      expect(render("{{ value_json.state }}", JSON.stringify({ state: "ON" }))).toBe("ON");
    });

    it("fails to render json attributes of a plain payload", () => {
      expect.assertions(2);
      const { logger, render } = setup();
      expect(render("{{ value_json.state }}", "ON")).toBe("ON");
      expect(logger.error).toHaveBeenCalledWith(
        {
          error: new TypeError("'value_json' is undefined"),
          payload: "ON",
          template: "{{ value_json.state }}",
        },
        "error rendering template",
      );
    });

    it("fails to render attributes of missing values", () => {
      expect.assertions(3);
      const { logger, render } = setup();
      expect(render("{{ value_json.a.b }}", "{}")).toBe("{}");
      expect(render("{{ value_json.a.b }}", JSON.stringify({ a: null }))).toBe('{"a":null}');
      expect(logger.error).toHaveBeenCalledTimes(2);
    });

    it("renders nothing for missing keys", () => {
      expect.assertions(2);
      const { logger, render } = setup();
      expect(render("{{ value_json.state }}", "{}")).toBe("");
      expect(logger.error).not.toHaveBeenCalled();
    });

    it("keeps surrounding text and trims", () => {
      expect.assertions(2);
      const { render } = setup();
      expect(render("prefix-{{ value }}", "x")).toBe("prefix-x");
      expect(render("  {{ value }}  ", "ON")).toBe("ON");
    });

    it("indexes arrays", () => {
      expect.assertions(1);
      const { render } = setup();
      expect(render("{{ value_json.items[1] }}", JSON.stringify({ items: ["a", "b"] }))).toBe("b");
    });

    it("looks up host states", () => {
      expect.assertions(1);
      const { render } = setup();
      expect(render("{{ states('binary_sensor.door') }}", "")).toBe("on");
    });

    it("only reads own properties", () => {
      expect.assertions(1);
      const { render } = setup();
      expect(render("{{ value_json.constructor }}", "{}")).toBe("");
    });
  });

  // #MARK: output
  describe("output", () => {
    it("formats booleans and none", () => {
      expect.assertions(2);
      const { render } = setup();
      expect(render("{{ value_json.flag }}", JSON.stringify({ flag: true }))).toBe("True");
      expect(render("{{ value_json.flag }}", JSON.stringify({ flag: null }))).toBe("None");
    });

    it("formats floats like python", () => {
      expect.assertions(3);
      const { render } = setup();
      expect(render("{{ value | float }}", "1")).toBe("1.0");
      expect(render("{{ value_json.t | round }}", JSON.stringify({ t: 3.7 }))).toBe("4.0");
      expect(render("{{ value | int | round }}", "3")).toBe("3");
    });

    it("compares floats by value", () => {
      expect.assertions(1);
      const { render } = setup();
      expect(render("{{ 'ON' if value | float == 1 else 'OFF' }}", "1")).toBe("ON");
    });

    it("serializes objects", () => {
      expect.assertions(1);
      const { render } = setup();
      expect(render("{{ value_json.a }}", JSON.stringify({ a: { b: 1 } }))).toBe('{"b":1}');
    });
  });

  // #MARK: expressions
  describe("expressions", () => {
    it("evaluates conditionals", () => {
      expect.assertions(2);
      const { render } = setup();
      const source = "{{ 'ON' if value_json.open else 'OFF' }}";
      expect(render(source, JSON.stringify({ open: true }))).toBe("ON");
      expect(render(source, JSON.stringify({ open: false }))).toBe("OFF");
    });

    it("compares values", () => {
      expect.assertions(2);
      const { render } = setup();
      expect(render("{{ 'ON' if value == 'yes' else 'OFF' }}", "yes")).toBe("ON");
      expect(render("{{ value != 'yes' }}", "yes")).toBe("False");
    });

    it("evaluates boolean operators", () => {
      expect.assertions(3);
      const { render } = setup();
      expect(render("{{ not value_json.x }}", JSON.stringify({ x: 0 }))).toBe("True");
      expect(render("{{ value_json.a or 'fallback' }}", "{}")).toBe("fallback");
      expect(render("{{ value_json.a and value_json.b }}", JSON.stringify({ a: 1, b: 2 }))).toBe(
        "2",
      );
    });
  });

  // #MARK: filters
  describe("filters", () => {
    it.each([
      ["{{ value | int }}", "12.7", "12"],
      ["{{ value | float | round(1) }}", "3.14159", "3.1"],
      ["{{ value | lower }}", "OPEN", "open"],
      ["{{ value | upper }}", "open", "OPEN"],
      ["{{ value | replace('_', ' ') }}", "a_b", "a b"],
      ["{{ value | trim }}", "x", "x"],
      ["{{ value_json.missing | default('OFF') }}", "{}", "OFF"],
      ["{{ value | int | string }}", "abc", "0"],
    ])("%s renders %s as %s", (source, payload, expected) => {
      expect.assertions(1);
      const { render } = setup();
      expect(render(source, payload)).toBe(expected);
    });
  });

  // #MARK: errors
  describe("errors", () => {
    it("rejects unknown filters at compile time", () => {
      expect.assertions(1);
      const { render } = setup();
      expect(() => render("{{ value | unknown }}", "ON")).toThrow(
        'unknown filter "unknown" in template: {{ value | unknown }}',
      );
    });

    it("rejects malformed expressions", () => {
      expect.assertions(3);
      const { render } = setup();
      expect(() => render("{{ 'open }}", "ON")).toThrow(MqttSensorTemplateError);
      expect(() => render("{{ value ) }}", "ON")).toThrow("unexpected trailing input");
      expect(() => render("{{ value > 1 }}", "ON")).toThrow('unexpected character ">"');
    });

    it("rejects statement and comment tags", () => {
      expect.assertions(2);
      const { render } = setup();
      expect(() => render("{% if value == 'a' %}ON{% else %}OFF{% endif %}", "a")).toThrow(
        MqttSensorTemplateError,
      );
      expect(() => render("{# note #}{{ value }}", "a")).toThrow(
        "statement and comment tags are not supported in template: {# note #}{{ value }}",
      );
    });

    it("passes the payload through when rendering fails", () => {
      expect.assertions(2);
      const { logger, render } = setup();
      expect(render("{{ value(1) }}", "raw")).toBe("raw");
      expect(logger.error).toHaveBeenCalledWith(
        { error: expect.any(TypeError), payload: "raw", template: "{{ value(1) }}" },
        "error rendering template",
      );
    });
  });
});
