import type { CompiledFilterPolicy, FilterRule, NumericBound } from "./filterPolicy.ts";
import type { MessageAttributeValue, MessageAttributes } from "./snsTypes.ts";

// Upstream compares numbers at six decimal digits
const NUMERIC_PRECISION = 1_000_000;

/**
 * Evaluates a compiled filter policy against message attributes.
 *
 * - No policy matches every message
 * - Fields are AND'd together (all must match)
 * - Rules of one field are OR'd (any can match)
 * - An attribute missing from the message only satisfies `{ "exists": false }`
 *
 * Pure: reads its inputs and nothing else.
 */
export function matchesFilterPolicy(
  policy: CompiledFilterPolicy | undefined,
  attributes: MessageAttributes,
): boolean {
  if (!policy) return true;

  for (const [field, rules] of policy) {
    const attr = Object.hasOwn(attributes, field) ? attributes[field] : undefined;
    if (!rules.some((rule) => matchesRule(rule, attr))) {
      return false;
    }
  }
  return true;
}

function matchesRule(rule: FilterRule, attr: MessageAttributeValue | undefined): boolean {
  if (rule.kind === "exists") {
    return rule.exists === (attr !== undefined);
  }
  if (attr === undefined) return false;

  switch (rule.kind) {
    case "string": {
      const value = rawValue(attr);
      if (value === rule.value) return true;
      // String.Array values arrive as JSON text
      const elements = parseJsonElements(value);
      return elements !== undefined && elements.includes(rule.value);
    }
    case "number": {
      const expected = rule.value;
      return numericValues(attr).some((value) => equalAtPrecision(value, expected));
    }
    case "boolean":
      return attr.DataType === "String" && attr.StringValue === String(rule.value);
    case "null":
      return false;
    case "prefix":
      return attr.DataType === "String" && (attr.StringValue ?? "").startsWith(rule.prefix);
    case "anything-but-prefix": {
      const prefix = rule.prefix;
      return comparableValues(attr).every((value) => !String(value).startsWith(prefix));
    }
    case "anything-but": {
      const excluded = rule.values;
      return comparableValues(attr).every((value) => !excluded.includes(value));
    }
    case "numeric": {
      if (attr.DataType !== "Number") return false;
      const value = toFiniteNumber(attr.StringValue);
      if (value === undefined) return false;
      return rule.bounds.every((bound) => satisfiesBound(value, bound));
    }
  }
}

function rawValue(attr: MessageAttributeValue): string {
  return attr.StringValue ?? attr.BinaryValue ?? "";
}

function parseJsonElements(value: string): unknown[] | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return undefined;
  }
  return Array.isArray(parsed) ? parsed : [parsed];
}

function numericValues(attr: MessageAttributeValue): number[] {
  const candidates =
    attr.DataType === "Number"
      ? [attr.StringValue]
      : attr.DataType === "String.Array"
        ? (parseJsonElements(rawValue(attr)) ?? [])
        : [];
  const values: number[] = [];
  for (const candidate of candidates) {
    const value = toFiniteNumber(candidate);
    if (value !== undefined) values.push(value);
  }
  return values;
}

/** Numbers and numeric text only; `null`, booleans, blanks and nested values never count. */
function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value !== "string" || value.trim() === "") return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** The values `anything-but` compares against: numbers for Number, elements for String.Array. */
function comparableValues(attr: MessageAttributeValue): Array<string | number> {
  if (attr.DataType === "Number") {
    return [Number(attr.StringValue)];
  }
  if (attr.DataType === "String.Array") {
    const elements = parseJsonElements(rawValue(attr));
    if (elements) {
      return elements.map((element) =>
        typeof element === "number" || typeof element === "string" ? element : JSON.stringify(element),
      );
    }
  }
  return [rawValue(attr)];
}

function equalAtPrecision(a: number, b: number): boolean {
  return Math.trunc(a * NUMERIC_PRECISION) === Math.trunc(b * NUMERIC_PRECISION);
}

function satisfiesBound(value: number, bound: NumericBound): boolean {
  switch (bound.operator) {
    case "=":
      return value === bound.value;
    case ">":
      return value > bound.value;
    case ">=":
      return value >= bound.value;
    case "<":
      return value < bound.value;
    case "<=":
      return value <= bound.value;
  }
}
