import type { RelayEvent } from "../model.js";

/**
 * A live listener on the event feed, identified by its connection id.
 * The Broadcaster owns the registration, not the transport behind it.
 */
export interface Observer {
  readonly id: string;
  /** Deliver one event. Throwing or rejecting drops the observer. */
  deliver(event: RelayEvent): void | Promise<void>;
  /** Called once when the Broadcaster drops the observer. */
  close?(reason: string): void;
}
