import { describe, it, expect } from "vitest";
import {
  optionalParam,
  parseBatchEntries,
  parseEntryMap,
  parseMemberList,
  parseMessageAttributes,
  parseTags,
  requireParam,
  toQueryParams,
} from "../../src/sns/queryParams.ts";

describe("query params", () => {
  it("keeps only string fields of a form body", () => {
    expect(toQueryParams({ Action: "Publish", Count: 3, Nested: {} })).toEqual({ Action: "Publish" });
    expect(toQueryParams(undefined)).toEqual({});
  });

  it("treats empty strings as missing", () => {
    const params = { Name: "", Other: "x" };
    expect(optionalParam(params, "Name")).toBeUndefined();
    expect(optionalParam(params, "Other")).toBe("x");
    expect(() => requireParam(params, "Name")).toThrow(
      "Invalid parameter: Name Reason: no value for required parameter",
    );
  });

  it("orders members by numeric index", () => {
    const params = {
      "ActionName.member.10": "c",
      "ActionName.member.2": "b",
      "ActionName.member.1": "a",
    };
    expect(parseMemberList(params, "ActionName")).toEqual(["a", "b", "c"]);
  });

  it("reads entry maps and tags", () => {
    expect(
      parseEntryMap(
        {
          "Attributes.entry.1.key": "DisplayName",
          "Attributes.entry.1.value": "Orders",
          "Attributes.entry.2.key": "FifoTopic",
        },
        "Attributes",
      ),
    ).toEqual({ DisplayName: "Orders", FifoTopic: "" });

    expect(
      parseTags({
        "Tags.member.1.Key": "env",
        "Tags.member.1.Value": "test",
      }),
    ).toEqual({ env: "test" });
  });

  it("reads typed message attributes", () => {
    expect(
      parseMessageAttributes({
        "MessageAttributes.entry.1.Name": "price",
        "MessageAttributes.entry.1.Value.DataType": "Number",
        "MessageAttributes.entry.1.Value.StringValue": "10",
        "MessageAttributes.entry.2.Name": "no-type",
      }),
    ).toEqual({ price: { DataType: "Number", StringValue: "10" } });
  });

  it("reads batch entries with their own attributes", () => {
    const entries = parseBatchEntries({
      "PublishBatchRequestEntries.member.2.Id": "second",
      "PublishBatchRequestEntries.member.2.Message": "b",
      "PublishBatchRequestEntries.member.1.Id": "first",
      "PublishBatchRequestEntries.member.1.Message": "a",
      "PublishBatchRequestEntries.member.1.MessageGroupId": "g",
      "PublishBatchRequestEntries.member.1.MessageAttributes.entry.1.Name": "color",
      "PublishBatchRequestEntries.member.1.MessageAttributes.entry.1.Value.DataType": "String",
      "PublishBatchRequestEntries.member.1.MessageAttributes.entry.1.Value.StringValue": "red",
    });

    expect(entries).toEqual([
      {
        id: "first",
        message: "a",
        subject: undefined,
        messageStructure: undefined,
        messageAttributes: { color: { DataType: "String", StringValue: "red" } },
        messageGroupId: "g",
        messageDeduplicationId: undefined,
      },
      {
        id: "second",
        message: "b",
        subject: undefined,
        messageStructure: undefined,
        messageAttributes: {},
        messageGroupId: undefined,
        messageDeduplicationId: undefined,
      },
    ]);
  });
});
