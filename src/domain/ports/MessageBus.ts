import type { Address } from "../typedefs.js";

/**
 * Outbound text delivery. Delivery is best effort: a failure for one recipient
 * is logged by the implementation and never rejects the whole publish.
 */
export interface MessageBus {
  publish(recipients: readonly Address[], text: string): Promise<void>;
}
