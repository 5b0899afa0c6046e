import { parseArn } from "../../common/arnHelper.ts";
import { DeliveryFailureError } from "../../common/errors.ts";
import { messageForProtocol } from "../envelope.ts";
import { normalizeSmsEndpoint } from "../publishValidation.ts";
import type { Delivery, Transport } from "./transport.ts";

export interface SmsLog {
  recordSms(phoneNumber: string, message: string): string;
}

/** Records SMS deliveries in the log of the account and region that owns the subscription. */
export class SmsTransport implements Transport {
  private readonly resolveLog: (accountId: string, region: string) => SmsLog;

  constructor(resolveLog: (accountId: string, region: string) => SmsLog) {
    this.resolveLog = resolveLog;
  }

  async deliver({ subscription, notification }: Delivery): Promise<void> {
    const owner = parseArn(subscription.arn);
    const phoneNumber = normalizeSmsEndpoint(subscription.endpoint);
    if (!owner || !phoneNumber) {
      throw new DeliveryFailureError(subscription.arn, `Invalid SMS endpoint: ${subscription.endpoint}`);
    }
    this.resolveLog(owner.accountId, owner.region).recordSms(
      phoneNumber,
      messageForProtocol(notification, "sms"),
    );
  }
}
