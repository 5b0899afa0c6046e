import { createHash } from "node:crypto";
import { InvalidParameterError } from "../common/errors.ts";
import { MAX_SUBJECT_LENGTH } from "../common/types.ts";
import type { MessageAttributes } from "./snsTypes.ts";

const ATTRIBUTE_TYPE_PREFIXES: ReadonlySet<string> = new Set(["String", "Number", "Binary"]);

export function validateSubject(subject: string | undefined): void {
  if (subject !== undefined && subject.length > MAX_SUBJECT_LENGTH) {
    throw new InvalidParameterError(
      `Invalid parameter: Subject Reason: Subject must be less than ${MAX_SUBJECT_LENGTH} characters`,
    );
  }
}

export function validateMessageSize(message: string, maxBytes: number): void {
  if (Buffer.byteLength(message, "utf8") > maxBytes) {
    throw new InvalidParameterError("Invalid parameter: Message too long");
  }
}

export function validateMessageAttributes(attributes: MessageAttributes): void {
  for (const [name, attr] of Object.entries(attributes)) {
    const typePrefix = attr.DataType.split(".")[0];
    if (!ATTRIBUTE_TYPE_PREFIXES.has(typePrefix)) {
      throw new InvalidParameterError(
        `The message attribute '${name}' has an invalid message attribute type, the set of supported type prefixes is Binary, Number, and String.`,
        "InvalidParameterValue",
      );
    }

    const value = typePrefix === "Binary" ? attr.BinaryValue : attr.StringValue;
    if (!value) {
      throw new InvalidParameterError(
        `The message attribute '${name}' must contain non-empty message attribute value for message attribute type '${attr.DataType}'.`,
        "InvalidParameterValue",
      );
    }

    if (typePrefix === "Number" && (value.trim() === "" || !Number.isFinite(Number(value)))) {
      throw new InvalidParameterError(
        `Could not cast message attribute '${name}' value to number.`,
        "InvalidParameterValue",
      );
    }
  }
}

/**
 * Parses a `MessageStructure=json` body into its per-protocol messages.
 * The `default` entry is mandatory.
 */
export function parseMessageStructure(
  messageStructure: string | undefined,
  message: string,
): Record<string, string> | undefined {
  if (messageStructure === undefined || messageStructure === "") return undefined;
  if (messageStructure !== "json") {
    throw new InvalidParameterError(
      `Invalid parameter: MessageStructure Reason: ${messageStructure} is not a valid value`,
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(message);
  } catch {
    throw new InvalidParameterError(
      "Invalid parameter: Message Structure - JSON message body failed to parse",
    );
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new InvalidParameterError(
      "Invalid parameter: Message Structure - JSON message body failed to parse",
    );
  }

  const messages: Record<string, string> = {};
  for (const [protocol, value] of Object.entries(parsed)) {
    if (typeof value === "string") messages[protocol] = value;
  }
  if (messages.default === undefined) {
    throw new InvalidParameterError(
      "Invalid parameter: Message Structure - No default entry in JSON message body",
    );
  }
  return messages;
}

export function contentBasedDeduplicationId(message: string): string {
  return createHash("sha256").update(message).digest("hex");
}

/**
 * Phone numbers may carry `.`, `/` or `-` separators, but never two in a row
 * and never at either end.
 */
export function normalizeSmsEndpoint(endpoint: string): string | undefined {
  if (/[./-]{2,}/.test(endpoint) || /(^[./-]|[./-]$)/.test(endpoint)) {
    return undefined;
  }
  return endpoint.replace(/[./-]/g, "");
}
