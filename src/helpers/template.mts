import { MqttSensorTemplateError, type SensorLogger, type ValueTemplate } from "./utility.mts";

/**
 * Host data available to templates, bound when the template is compiled
 */
export type TemplateContext = {
  logger: SensorLogger;
  states: (entity_id: string) => string | undefined;
};

type Scope = Record<string, unknown>;

type Node =
  | { type: "literal"; value: unknown }
  | { type: "name"; name: string }
  | { type: "member"; target: Node; key: Node }
  | { type: "call"; callee: Node; args: Node[] }
  | { type: "filter"; target: Node; name: string; args: Node[] }
  | { type: "not"; operand: Node }
  | { type: "logical"; operator: "and" | "or"; left: Node; right: Node }
  | { type: "compare"; operator: "==" | "!="; left: Node; right: Node }
  | { type: "conditional"; test: Node; consequent: Node; alternate: Node };

type Token =
  | { type: "string"; value: string }
  | { type: "number"; value: number }
  | { type: "name"; value: string }
  | { type: "punct"; value: string };

type Segment = { type: "text"; text: string } | { type: "expression"; node: Node };

const LITERALS = new Map<string, unknown>([
  ["true", true],
  ["True", true],
  ["false", false],
  ["False", false],
  ["none", null],
  ["None", null],
]);
const KEYWORDS = new Set(["and", "or", "not", "if", "else"]);
const PUNCTUATION = ["==", "!=", ".", "[", "]", "(", ")", "|", ","];
const EXPRESSION = /{{(.*?)}}/gs;

// #MARK: tokenize
function tokenize(source: string, expression: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;
  while (index < expression.length) {
    const char = expression[index];
    if (/\s/.test(char)) {
      index++;
      continue;
    }
    if (char === "'" || char === '"') {
      const end = expression.indexOf(char, index + 1);
      if (end === -1) {
        throw new MqttSensorTemplateError(source, "unterminated string");
      }
      tokens.push({ type: "string", value: expression.slice(index + 1, end) });
      index = end + 1;
      continue;
    }
    const number = /^\d+(\.\d+)?/.exec(expression.slice(index));
    if (number) {
      tokens.push({ type: "number", value: Number(number[0]) });
      index += number[0].length;
      continue;
    }
    const name = /^[A-Z_a-z]\w*/.exec(expression.slice(index));
    if (name) {
      tokens.push({ type: "name", value: name[0] });
      index += name[0].length;
      continue;
    }
    const punct = PUNCTUATION.find(item => expression.startsWith(item, index));
    if (!punct) {
      throw new MqttSensorTemplateError(source, `unexpected character "${char}"`);
    }
    tokens.push({ type: "punct", value: punct });
    index += punct.length;
  }
  return tokens;
}

// #MARK: parse
function parse(source: string, expression: string): Node {
  const tokens = tokenize(source, expression);
  let position = 0;

  const peek = () => tokens[position];
  const isPunct = (value: string) => {
    const token = peek();
    return token?.type === "punct" && token.value === value;
  };
  const isKeyword = (value: string) => {
    const token = peek();
    return token?.type === "name" && token.value === value;
  };
  const expect = (value: string) => {
    if (!isPunct(value)) {
      throw new MqttSensorTemplateError(source, `expected "${value}"`);
    }
    position++;
  };

  function parseArguments(): Node[] {
    const args: Node[] = [];
    expect("(");
    while (!isPunct(")")) {
      args.push(parseConditional());
      if (!isPunct(",")) {
        break;
      }
      position++;
    }
    expect(")");
    return args;
  }

  function parsePrimary(): Node {
    const token = peek();
    position++;
    if (!token) {
      throw new MqttSensorTemplateError(source, "unexpected end of expression");
    }
    if (token.type === "string" || token.type === "number") {
      return { type: "literal", value: token.value };
    }
    if (token.type === "name" && !KEYWORDS.has(token.value)) {
      return LITERALS.has(token.value)
        ? { type: "literal", value: LITERALS.get(token.value) }
        : { type: "name", name: token.value };
    }
    if (token.type === "punct" && token.value === "(") {
      const inner = parseConditional();
      expect(")");
      return inner;
    }
    throw new MqttSensorTemplateError(source, `unexpected "${token.value}"`);
  }

  function parsePostfix(): Node {
    let node = parsePrimary();
    for (;;) {
      if (isPunct(".")) {
        position++;
        const token = peek();
        if (token?.type !== "name") {
          throw new MqttSensorTemplateError(source, "expected attribute name");
        }
        position++;
        node = { key: { type: "literal", value: token.value }, target: node, type: "member" };
      } else if (isPunct("[")) {
        position++;
        const key = parseConditional();
        expect("]");
        node = { key, target: node, type: "member" };
      } else if (isPunct("(")) {
        node = { args: parseArguments(), callee: node, type: "call" };
      } else {
        return node;
      }
    }
  }

  function parseFiltered(): Node {
    let node = parsePostfix();
    while (isPunct("|")) {
      position++;
      const token = peek();
      if (token?.type !== "name") {
        throw new MqttSensorTemplateError(source, "expected filter name");
      }
      position++;
      if (!FILTERS.has(token.value)) {
        throw new MqttSensorTemplateError(source, `unknown filter "${token.value}"`);
      }
      const args = isPunct("(") ? parseArguments() : [];
      node = { args, name: token.value, target: node, type: "filter" };
    }
    return node;
  }

  function parseComparison(): Node {
    const left = parseFiltered();
    const token = peek();
    if (token?.type === "punct" && (token.value === "==" || token.value === "!=")) {
      position++;
      return { left, operator: token.value, right: parseFiltered(), type: "compare" };
    }
    return left;
  }

  function parseNot(): Node {
    if (isKeyword("not")) {
      position++;
      return { operand: parseNot(), type: "not" };
    }
    return parseComparison();
  }

  function parseAnd(): Node {
    let left = parseNot();
    while (isKeyword("and")) {
      position++;
      left = { left, operator: "and", right: parseNot(), type: "logical" };
    }
    return left;
  }

  function parseOr(): Node {
    let left = parseAnd();
    while (isKeyword("or")) {
      position++;
      left = { left, operator: "or", right: parseAnd(), type: "logical" };
    }
    return left;
  }

  function parseConditional(): Node {
    const consequent = parseOr();
    if (!isKeyword("if")) {
      return consequent;
    }
    position++;
    const test = parseOr();
    let alternate: Node = { type: "literal", value: undefined };
    if (isKeyword("else")) {
      position++;
      alternate = parseConditional();
    }
    return { alternate, consequent, test, type: "conditional" };
  }

  const node = parseConditional();
  if (position < tokens.length) {
    throw new MqttSensorTemplateError(source, "unexpected trailing input");
  }
  return node;
}

// #MARK: evaluate
/**
 * Result of `float` and `round`, rendered with a trailing `.0` when whole
 */
class FloatValue {
  constructor(readonly value: number) {}
}

const unwrap = (value: unknown) => (value instanceof FloatValue ? value.value : value);

const toNumber = (input: unknown, parse: (input: string) => number) => {
  const value = unwrap(input);
  const out = typeof value === "number" ? value : parse(String(value));
  return Number.isNaN(out) ? 0 : out;
};

const FILTERS = new Map<string, (value: unknown, ...args: unknown[]) => unknown>([
  ["default", (value, fallback = "") => (value === undefined ? fallback : value)],
  ["float", value => new FloatValue(toNumber(value, Number.parseFloat))],
  ["int", value => Math.trunc(toNumber(value, Number.parseFloat))],
  ["lower", value => render(value).toLowerCase()],
  ["replace", (value, from, to) => render(value).replaceAll(render(from), render(to))],
  [
    "round",
    (value, digits = 0) => {
      const factor = 10 ** toNumber(digits, Number.parseInt);
      const out = Math.round(toNumber(value, Number.parseFloat) * factor) / factor;
      return Number.isInteger(value) ? out : new FloatValue(out);
    },
  ],
  ["string", value => render(value)],
  ["trim", value => render(value).trim()],
  ["upper", value => render(value).toUpperCase()],
]);

function member(input: unknown, index: unknown): unknown {
  const target = unwrap(input);
  const key = unwrap(index);
  if (target === undefined || target === null) {
    throw new TypeError(`cannot read '${render(key)}' of ${render(target) || "undefined"}`);
  }
  if (Array.isArray(target) && typeof key === "number") {
    return target.at(key);
  }
  if (typeof target === "object") {
    const name = String(key);
    return Object.hasOwn(target, name) ? Reflect.get(target, name) : undefined;
  }
  return undefined;
}

function truthy(input: unknown): boolean {
  const value = unwrap(input);
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (typeof value === "object" && value !== null) {
    return Object.keys(value).length > 0;
  }
  return Boolean(value);
}

function evaluate(node: Node, scope: Scope): unknown {
  switch (node.type) {
    case "literal": {
      return node.value;
    }
    case "name": {
      if (!Object.hasOwn(scope, node.name)) {
        throw new TypeError(`'${node.name}' is undefined`);
      }
      return scope[node.name];
    }
    case "member": {
      return member(evaluate(node.target, scope), evaluate(node.key, scope));
    }
    case "call": {
      const callee = evaluate(node.callee, scope);
      if (typeof callee !== "function") {
        throw new TypeError("value is not callable");
      }
      const args = node.args.map(arg => evaluate(arg, scope));
      const result: unknown = callee(...args);
      return result;
    }
    case "filter": {
      const filter = FILTERS.get(node.name);
      if (!filter) {
        throw new TypeError(`unknown filter ${node.name}`);
      }
      return filter(
        evaluate(node.target, scope),
        ...node.args.map(arg => evaluate(arg, scope)),
      );
    }
    case "not": {
      return !truthy(evaluate(node.operand, scope));
    }
    case "logical": {
      const left = evaluate(node.left, scope);
      if (node.operator === "and") {
        return truthy(left) ? evaluate(node.right, scope) : left;
      }
      return truthy(left) ? left : evaluate(node.right, scope);
    }
    case "compare": {
      const same = unwrap(evaluate(node.left, scope)) === unwrap(evaluate(node.right, scope));
      return node.operator === "==" ? same : !same;
    }
    case "conditional": {
      return truthy(evaluate(node.test, scope))
        ? evaluate(node.consequent, scope)
        : evaluate(node.alternate, scope);
    }
  }
}

/**
 * Output formatting follows the python-side conventions: `True`, `None`, `1.0`, undefined renders empty
 */
function render(value: unknown): string {
  if (value === undefined) {
    return "";
  }
  if (value === null) {
    return "None";
  }
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }
  if (value instanceof FloatValue) {
    return Number.isInteger(value.value) ? `${value.value}.0` : String(value.value);
  }
  if (typeof value === "object") {
    return JSON.stringify(value);
  }
  return String(value);
}

// #MARK: compileValueTemplate
/**
 * Compile a template string into a `payload -> payload` function.
 *
 * Variables: `value` (raw payload), `value_json` (payload parsed as json, when it parses), `states(entity_id)`.
 *
 * Syntax errors and `{% %}` / `{# #}` tags throw at compile time.
 * Reading an undefined variable, or an attribute of `undefined` / `None`, is a render error.
 * Errors during rendering are logged, and the raw payload is passed through.
 */
export function compileValueTemplate(source: string, context: TemplateContext): ValueTemplate {
  if (source.includes("{%") || source.includes("{#")) {
    throw new MqttSensorTemplateError(source, "statement and comment tags are not supported");
  }
  const segments: Segment[] = [];
  let last = 0;
  for (const match of source.matchAll(EXPRESSION)) {
    const start = match.index ?? 0;
    if (start > last) {
      segments.push({ text: source.slice(last, start), type: "text" });
    }
    segments.push({ node: parse(source, match[1]), type: "expression" });
    last = start + match[0].length;
  }
  if (last < source.length) {
    segments.push({ text: source.slice(last), type: "text" });
  }

  const { logger, states } = context;
  return (payload: string) => {
    const scope: Scope = { states, value: payload };
    try {
      scope.value_json = JSON.parse(payload);
    } catch {
      logger.trace({ payload }, "payload is not json");
    }
    try {
      return segments
        .map(segment =>
          segment.type === "text" ? segment.text : render(evaluate(segment.node, scope)),
        )
        .join("")
        .trim();
    } catch (error) {
      logger.error({ error, payload, template: source }, "error rendering template");
      return payload;
    }
  };
}
