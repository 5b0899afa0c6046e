import { InvalidParameterError, ResourceLimitExceededError, SnsError } from "../common/errors.ts";

export type NumericOperator = "<" | "<=" | "=" | ">" | ">=";

export interface NumericBound {
  operator: NumericOperator;
  value: number;
}

export type FilterRule =
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "boolean"; value: boolean }
  | { kind: "null" }
  | { kind: "exists"; exists: boolean }
  | { kind: "prefix"; prefix: string }
  | { kind: "anything-but"; values: Array<string | number> }
  | { kind: "anything-but-prefix"; prefix: string }
  | { kind: "numeric"; bounds: NumericBound[] };

/** Attribute name to the rules of which at least one must hold. */
export type CompiledFilterPolicy = ReadonlyMap<string, readonly FilterRule[]>;

// Documented as 100, enforced upstream as 150
const MAX_COMBINATIONS = 150;
const MAX_NUMBER_MAGNITUDE = 1_000_000_000;

const NUMERIC_OPERATORS: ReadonlySet<string> = new Set(["<", "<=", "=", ">", ">="]);
const LOWER_BOUND_OPERATORS: ReadonlySet<string> = new Set([">", ">="]);
const UPPER_BOUND_OPERATORS: ReadonlySet<string> = new Set(["<", "<="]);

const POLICY_ERROR = "Invalid parameter: FilterPolicy:";
const NUMERIC_ERROR = "Invalid parameter: Attributes Reason: FilterPolicy:";

/**
 * Parses and compiles the JSON text of a `FilterPolicy` attribute.
 */
export function parseFilterPolicy(json: string): CompiledFilterPolicy {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch {
    throw new InvalidParameterError(`${POLICY_ERROR} failed to parse JSON.`);
  }
  return compileFilterPolicy(raw);
}

/**
 * Validates a raw filter policy document and compiles it into the matcher's representation.
 *
 * Structure is checked first, then the combination ceiling (product of all rule-list
 * lengths), then every individual rule. Nothing is returned unless the whole policy is valid.
 */
export function compileFilterPolicy(raw: unknown): CompiledFilterPolicy {
  if (!isPlainObject(raw)) {
    throw new InvalidParameterError(`${POLICY_ERROR} Filter policy must be a JSON object`);
  }

  const fields: Array<[string, unknown[]]> = [];
  for (const [field, rules] of Object.entries(raw)) {
    if (!Array.isArray(rules)) {
      throw new InvalidParameterError(`${POLICY_ERROR} "${field}" must be an object or an array`);
    }
    if (rules.length === 0) {
      throw new InvalidParameterError(`${POLICY_ERROR} Empty arrays are not allowed`);
    }
    fields.push([field, rules]);
  }

  let combinations = 1;
  for (const [, rules] of fields) {
    combinations *= rules.length;
  }
  if (combinations > MAX_COMBINATIONS) {
    throw new ResourceLimitExceededError(
      "FilterPolicyLimitExceeded",
      `${POLICY_ERROR} Filter policy is too complex`,
    );
  }

  const compiled = new Map<string, FilterRule[]>();
  for (const [field, rules] of fields) {
    compiled.set(field, rules.map(compileRule));
  }
  return compiled;
}

function compileRule(rule: unknown): FilterRule {
  if (rule === null) return { kind: "null" };
  if (typeof rule === "string") return { kind: "string", value: rule };
  if (typeof rule === "boolean") return { kind: "boolean", value: rule };

  if (typeof rule === "number") {
    if (rule <= -MAX_NUMBER_MAGNITUDE || rule >= MAX_NUMBER_MAGNITUDE) {
      throw new SnsError("InternalError", "Unknown", 500, false);
    }
    return { kind: "number", value: rule };
  }

  if (isPlainObject(rule)) {
    const [keyword, value] = singleEntry(rule);
    switch (keyword) {
      case "exists":
        if (typeof value !== "boolean") {
          throw new InvalidParameterError(
            `${POLICY_ERROR} exists match pattern must be either true or false.`,
          );
        }
        return { kind: "exists", exists: value };
      case "prefix":
        return { kind: "prefix", prefix: expectPrefix(value) };
      case "anything-but":
        return compileAnythingBut(value);
      case "numeric":
        return { kind: "numeric", bounds: compileNumericRange(value) };
      default:
        throw new InvalidParameterError(`${POLICY_ERROR} Unrecognized match type ${keyword}`);
    }
  }

  throw new InvalidParameterError(
    `${POLICY_ERROR} Match value must be String, number, true, false, or null`,
  );
}

function compileAnythingBut(value: unknown): FilterRule {
  if (typeof value === "string" || typeof value === "number") {
    return { kind: "anything-but", values: [value] };
  }

  if (Array.isArray(value)) {
    if (value.length === 0) {
      throw new InvalidParameterError(`${POLICY_ERROR} Empty arrays are not allowed`);
    }
    const values: Array<string | number> = [];
    for (const item of value) {
      if (typeof item !== "string" && typeof item !== "number") {
        throw new InvalidParameterError(
          `${POLICY_ERROR} Inside anything but list, start|null|boolean is not supported.`,
        );
      }
      values.push(item);
    }
    return { kind: "anything-but", values };
  }

  if (isPlainObject(value)) {
    const [keyword, nested] = singleEntry(value);
    if (keyword !== "prefix") {
      throw new InvalidParameterError(`${POLICY_ERROR} Unsupported anything-but pattern: ${keyword}`);
    }
    return { kind: "anything-but-prefix", prefix: expectPrefix(nested) };
  }

  throw new InvalidParameterError(
    `${POLICY_ERROR} Value of anything-but must be an array or single string/number value.`,
  );
}

/**
 * Grammar: `op, bound` optionally followed by `upperOp, upperBound`, where a two-sided
 * range must open with a lower bound (`>`/`>=`), close with an upper bound (`<`/`<=`)
 * and have `upperBound > bound`.
 */
function compileNumericRange(value: unknown): NumericBound[] {
  if (!Array.isArray(value)) {
    throw new InvalidParameterError(`${NUMERIC_ERROR} Value of numeric must be an array.`);
  }
  const tokens: unknown[] = [...value];

  if (tokens.length === 0) {
    throw new InvalidParameterError(`${NUMERIC_ERROR} Invalid member in numeric match: ]`);
  }

  const operator = tokens.shift();
  if (typeof operator !== "string") {
    throw new InvalidParameterError(
      `${NUMERIC_ERROR} Invalid member in numeric match: ${String(operator)}`,
    );
  }
  if (!isNumericOperator(operator)) {
    throw new InvalidParameterError(
      `${NUMERIC_ERROR} Unrecognized numeric range operator: ${operator}`,
    );
  }

  const bound = tokens.shift();
  if (typeof bound !== "number") {
    throw new InvalidParameterError(`${NUMERIC_ERROR} Value of ${operator} must be numeric`);
  }

  const bounds: NumericBound[] = [{ operator, value: bound }];
  if (tokens.length === 0) return bounds;

  if (!LOWER_BOUND_OPERATORS.has(operator)) {
    throw new InvalidParameterError(`${NUMERIC_ERROR} Too many elements in numeric expression`);
  }

  const upperOperator = tokens.shift();
  if (typeof upperOperator !== "string" || !UPPER_BOUND_OPERATORS.has(upperOperator) || !isNumericOperator(upperOperator)) {
    throw new InvalidParameterError(
      `${NUMERIC_ERROR} Bad numeric range operator: ${String(upperOperator)}`,
    );
  }

  const upperBound = tokens.shift();
  if (typeof upperBound !== "number") {
    throw new InvalidParameterError(`${NUMERIC_ERROR} Value of ${upperOperator} must be numeric`);
  }
  if (upperBound <= bound) {
    throw new InvalidParameterError(`${NUMERIC_ERROR} Bottom must be less than top`);
  }
  if (tokens.length > 0) {
    throw new InvalidParameterError(`${NUMERIC_ERROR} Too many elements in numeric expression`);
  }

  bounds.push({ operator: upperOperator, value: upperBound });
  return bounds;
}

function expectPrefix(value: unknown): string {
  if (typeof value !== "string") {
    throw new InvalidParameterError(`${POLICY_ERROR} prefix match pattern must be a string`);
  }
  return value;
}

function singleEntry(obj: Record<string, unknown>): [string, unknown] {
  const entries = Object.entries(obj);
  if (entries.length === 0) {
    throw new InvalidParameterError(`${POLICY_ERROR} Empty objects are not allowed`);
  }
  if (entries.length > 1) {
    throw new InvalidParameterError(`${POLICY_ERROR} Only one key allowed in match expression`);
  }
  return entries[0];
}

function isNumericOperator(value: string): value is NumericOperator {
  return NUMERIC_OPERATORS.has(value);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
