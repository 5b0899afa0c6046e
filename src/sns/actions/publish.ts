import type { PublishBatchResultEntry, BatchResultErrorEntry, PublishResponse } from "@aws-sdk/client-sns";
import { escapeXml, snsSuccessResponse } from "../../common/xml.ts";
import type { QueryParams } from "../queryParams.ts";
import {
  optionalParam,
  parseBatchEntries,
  parseMessageAttributes,
  requireParam,
} from "../queryParams.ts";
import type { SnsBackend } from "../snsBackend.ts";

export async function publish(params: QueryParams, backend: SnsBackend): Promise<string> {
  const published = await backend.publish({
    topicArn: optionalParam(params, "TopicArn"),
    targetArn: optionalParam(params, "TargetArn"),
    phoneNumber: optionalParam(params, "PhoneNumber"),
    message: params.Message ?? "",
    subject: optionalParam(params, "Subject"),
    messageStructure: optionalParam(params, "MessageStructure"),
    messageAttributes: parseMessageAttributes(params),
    messageGroupId: optionalParam(params, "MessageGroupId"),
    messageDeduplicationId: optionalParam(params, "MessageDeduplicationId"),
  });

  const result = {
    MessageId: published.messageId,
    SequenceNumber: published.sequenceNumber,
  } satisfies PublishResponse;
  const sequenceXml = result.SequenceNumber
    ? `<SequenceNumber>${result.SequenceNumber}</SequenceNumber>`
    : "";
  return snsSuccessResponse("Publish", `<MessageId>${result.MessageId}</MessageId>${sequenceXml}`);
}

export async function publishBatch(params: QueryParams, backend: SnsBackend): Promise<string> {
  const result = await backend.publishBatch(
    requireParam(params, "TopicArn"),
    parseBatchEntries(params),
  );

  const successfulXml = result.successful
    .map((s) => {
      const entry = {
        Id: s.id,
        MessageId: s.messageId,
        SequenceNumber: s.sequenceNumber,
      } satisfies PublishBatchResultEntry;
      const sequenceXml = entry.SequenceNumber
        ? `<SequenceNumber>${entry.SequenceNumber}</SequenceNumber>`
        : "";
      return `<member><Id>${escapeXml(entry.Id)}</Id><MessageId>${entry.MessageId}</MessageId>${sequenceXml}</member>`;
    })
    .join("");

  const failedXml = result.failed
    .map((f) => {
      const entry = {
        Id: f.id,
        Code: f.code,
        Message: f.message,
        SenderFault: f.senderFault,
      } satisfies BatchResultErrorEntry;
      return `<member><Id>${escapeXml(entry.Id)}</Id><Code>${entry.Code}</Code><Message>${escapeXml(entry.Message)}</Message><SenderFault>${entry.SenderFault}</SenderFault></member>`;
    })
    .join("");

  return snsSuccessResponse(
    "PublishBatch",
    `<Successful>${successfulXml}</Successful><Failed>${failedXml}</Failed>`,
  );
}
