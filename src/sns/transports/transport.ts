import type { Notification } from "../envelope.ts";
import type { SnsSubscription } from "../snsTypes.ts";

export interface Delivery {
  subscription: SnsSubscription;
  notification: Notification;
}

/**
 * Hands one notification to one subscriber. Rejects when the subscriber did not
 * accept it; the dispatcher records the failure.
 */
export interface Transport {
  deliver(delivery: Delivery): Promise<void>;
}
