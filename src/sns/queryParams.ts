import { InvalidParameterError } from "../common/errors.ts";
import type { MessageAttributes, PublishBatchEntry } from "./snsTypes.ts";

export type QueryParams = Record<string, string>;

/** Keeps the string fields of a parsed form body. */
export function toQueryParams(body: unknown): QueryParams {
  const params: QueryParams = {};
  if (typeof body !== "object" || body === null) return params;
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === "string") params[key] = value;
  }
  return params;
}

export function requireParam(params: QueryParams, name: string): string {
  const value = params[name];
  if (value === undefined || value === "") {
    throw new InvalidParameterError(`Invalid parameter: ${name} Reason: no value for required parameter`);
  }
  return value;
}

/** Non-empty value or undefined; the query protocol sends absent strings as "". */
export function optionalParam(params: QueryParams, name: string): string | undefined {
  const value = params[name];
  return value === undefined || value === "" ? undefined : value;
}

/** Numeric member indices under `prefix`, in ascending order. */
function memberIndices(params: QueryParams, prefix: string): number[] {
  const pattern = new RegExp(`^${prefix.replace(/\./g, "\\.")}\\.(\\d+)(?:\\.|$)`);
  const indices = new Set<number>();
  for (const key of Object.keys(params)) {
    const match = pattern.exec(key);
    if (match) indices.add(parseInt(match[1], 10));
  }
  return Array.from(indices).sort((a, b) => a - b);
}

/** `{prefix}.member.N` */
export function parseMemberList(params: QueryParams, prefix: string): string[] {
  return memberIndices(params, `${prefix}.member`)
    .map((index) => params[`${prefix}.member.${index}`])
    .filter((value): value is string => value !== undefined);
}

/** `{prefix}.entry.N.key` / `{prefix}.entry.N.value` */
export function parseEntryMap(params: QueryParams, prefix: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const index of memberIndices(params, `${prefix}.entry`)) {
    const key = params[`${prefix}.entry.${index}.key`];
    if (key !== undefined) {
      result[key] = params[`${prefix}.entry.${index}.value`] ?? "";
    }
  }
  return result;
}

/** `{prefix}.member.N.Key` / `{prefix}.member.N.Value` */
export function parseTags(params: QueryParams, prefix: string = "Tags"): Record<string, string> {
  const result: Record<string, string> = {};
  for (const index of memberIndices(params, `${prefix}.member`)) {
    const key = params[`${prefix}.member.${index}.Key`];
    if (key !== undefined) {
      result[key] = params[`${prefix}.member.${index}.Value`] ?? "";
    }
  }
  return result;
}

/** `{prefix}MessageAttributes.entry.N.Name` with `.Value.DataType`, `.Value.StringValue`, `.Value.BinaryValue` */
export function parseMessageAttributes(params: QueryParams, prefix: string = ""): MessageAttributes {
  const base = `${prefix}MessageAttributes.entry`;
  const result: MessageAttributes = {};
  for (const index of memberIndices(params, base)) {
    const name = params[`${base}.${index}.Name`];
    const dataType = params[`${base}.${index}.Value.DataType`];
    if (!name || !dataType) continue;

    result[name] = { DataType: dataType };
    const stringValue = params[`${base}.${index}.Value.StringValue`];
    const binaryValue = params[`${base}.${index}.Value.BinaryValue`];
    if (stringValue !== undefined) result[name].StringValue = stringValue;
    if (binaryValue !== undefined) result[name].BinaryValue = binaryValue;
  }
  return result;
}

/** `PublishBatchRequestEntries.member.N.*` in index order. */
export function parseBatchEntries(params: QueryParams): PublishBatchEntry[] {
  const base = "PublishBatchRequestEntries.member";
  return memberIndices(params, base).map((index) => {
    const prefix = `${base}.${index}.`;
    return {
      id: params[`${prefix}Id`] ?? "",
      message: params[`${prefix}Message`] ?? "",
      subject: optionalParam(params, `${prefix}Subject`),
      messageStructure: optionalParam(params, `${prefix}MessageStructure`),
      messageAttributes: parseMessageAttributes(params, prefix),
      messageGroupId: optionalParam(params, `${prefix}MessageGroupId`),
      messageDeduplicationId: optionalParam(params, `${prefix}MessageDeduplicationId`),
    };
  });
}
