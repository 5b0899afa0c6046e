export class SnsError extends Error {
  readonly code: string;
  readonly statusCode: number;
  readonly senderFault: boolean;

  constructor(
    code: string,
    message: string,
    statusCode: number = 400,
    senderFault: boolean = true,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "SnsError";
    this.code = code;
    this.statusCode = statusCode;
    this.senderFault = senderFault;
  }
}

/** Missing topic, subscription, application or endpoint. Nothing is mutated. */
export class NotFoundError extends SnsError {
  constructor(message: string = "Topic does not exist", code: "NotFound" | "ResourceNotFound" = "NotFound") {
    super(code, message, 404);
    this.name = "NotFoundError";
  }
}

export type InvalidParameterCode =
  | "InvalidParameter"
  | "InvalidParameterValue"
  | "MissingParameter"
  | "EmptyBatchRequest"
  | "TooManyEntriesInBatchRequest"
  | "BatchEntryIdsNotDistinct"
  | "InvalidBatchEntryId";

export class InvalidParameterError extends SnsError {
  constructor(message: string, code: InvalidParameterCode = "InvalidParameter") {
    super(code, message, 400);
    this.name = "InvalidParameterError";
  }
}

export class ResourceLimitExceededError extends SnsError {
  constructor(
    code: "TagLimitExceeded" | "FilterPolicyLimitExceeded",
    message: string,
  ) {
    super(code, message, 400);
    this.name = "ResourceLimitExceededError";
  }
}

/**
 * One subscriber's transport failed. Recorded and logged by the dispatcher,
 * never thrown out of a publish call.
 */
export class DeliveryFailureError extends SnsError {
  readonly subscriptionArn: string;

  constructor(subscriptionArn: string, message: string, options?: ErrorOptions) {
    super("DeliveryFailure", message, 502, false, options);
    this.name = "DeliveryFailureError";
    this.subscriptionArn = subscriptionArn;
  }
}

/** Raised by the in-memory queue collaborator. */
export class SqsError extends Error {
  readonly code: string;
  readonly senderFault: boolean;

  constructor(code: string, message: string, senderFault: boolean = true) {
    super(message);
    this.name = "SqsError";
    this.code = code;
    this.senderFault = senderFault;
  }
}

export class QueueDoesNotExistError extends SqsError {
  constructor(queueName: string) {
    super("QueueDoesNotExist", `The specified queue ${queueName} does not exist.`);
  }
}

/** Raised by the in-memory function collaborator. */
export class LambdaError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "LambdaError";
    this.code = code;
  }
}
