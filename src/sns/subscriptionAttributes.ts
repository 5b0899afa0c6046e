import { InvalidParameterError } from "../common/errors.ts";
import type { CompiledFilterPolicy } from "./filterPolicy.ts";
import { parseFilterPolicy } from "./filterPolicy.ts";
import type { SnsSubscription } from "./snsTypes.ts";

export const SETTABLE_SUBSCRIPTION_ATTRIBUTES: ReadonlySet<string> = new Set([
  "RawMessageDelivery",
  "DeliveryPolicy",
  "FilterPolicy",
  "RedrivePolicy",
  "SubscriptionRoleArn",
]);

/** A validated attribute write; `filterPolicy: null` clears the subscription's filter. */
export interface PreparedSubscriptionAttribute {
  name: string;
  value: string;
  filterPolicy?: CompiledFilterPolicy | null;
}

/**
 * Validates an attribute write without touching any subscription, so callers can
 * reject a request before mutating state.
 */
export function prepareSubscriptionAttribute(
  name: string,
  value: string,
): PreparedSubscriptionAttribute {
  if (!SETTABLE_SUBSCRIPTION_ATTRIBUTES.has(name)) {
    throw new InvalidParameterError(
      `Invalid parameter: AttributeName Reason: Invalid attribute name: ${name}`,
    );
  }

  switch (name) {
    case "RawMessageDelivery": {
      const normalized = value.toLowerCase();
      if (normalized !== "true" && normalized !== "false") {
        throw new InvalidParameterError(
          `Invalid parameter: Attributes Reason: RawMessageDelivery: Invalid value [${value}]. Must be true or false.`,
        );
      }
      return { name, value: normalized };
    }
    case "FilterPolicy":
      if (value.trim() === "") {
        return { name, value: "", filterPolicy: null };
      }
      return { name, value, filterPolicy: parseFilterPolicy(value) };
    case "DeliveryPolicy":
    case "RedrivePolicy":
      if (value !== "") {
        try {
          JSON.parse(value);
        } catch {
          throw new InvalidParameterError(
            `Invalid parameter: ${name} Reason: failed to parse JSON`,
          );
        }
      }
      return { name, value };
    default:
      return { name, value };
  }
}

/** Stores a prepared attribute; a filter policy change swaps the compiled policy in one assignment. */
export function applySubscriptionAttribute(
  subscription: SnsSubscription,
  prepared: PreparedSubscriptionAttribute,
): void {
  if (prepared.filterPolicy === null) {
    delete subscription.attributes.FilterPolicy;
    subscription.filterPolicy = undefined;
    return;
  }
  subscription.attributes[prepared.name] = prepared.value;
  if (prepared.filterPolicy) {
    subscription.filterPolicy = prepared.filterPolicy;
  }
}

export function isRawDelivery(subscription: SnsSubscription): boolean {
  return subscription.attributes.RawMessageDelivery === "true";
}
