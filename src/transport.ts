// src/transport.ts

import { Address } from "./address";
import { Message } from "./message";

/**
 * The inbound side of a listener: a bounded queue bound to one address.
 */
export interface Connection {
  /** The address this connection is registered under. */
  readonly address: Address;

  /**
   * Waits for the next inbound message.
   * @returns The message, or undefined once the connection is closed.
   */
  receive(): Promise<Message | undefined>;

  /** Number of messages buffered and not yet received. */
  pending(): number;

  /** Whether close() has been called. */
  isClosed(): boolean;

  /**
   * Deregisters the address and releases the queue. Safe to call more than
   * once.
   */
  close(): void;
}

/**
 * A lightweight outbound handle returned by dial().
 */
export interface OutboundHandle {
  /** The dialed address. */
  readonly target: Address;

  /**
   * Delivers a message into the target's inbound queue. Throws instead of
   * waiting when the message cannot be delivered.
   */
  send(message: Message): void;

  /** Releases the handle. Further sends throw ConnectionClosedError. */
  close(): void;
}

/**
 * A process-local address space that nodes listen on and dial into,
 * with partition/heal fault injection.
 *
 * Every method reports failure by throwing synchronously:
 * - listen: AddressInUseError
 * - dial: AddressNotFoundError
 * - OutboundHandle.send: NetworkPartitionedError, AddressNotFoundError,
 *   QueueFullError, ConnectionClosedError
 */
export interface Network {
  listen(address: Address): Connection;

  dial(address: Address): OutboundHandle;

  /**
   * Marks every address in both groups as unreachable. Marks are per
   * address, so a marked address is cut off from everyone.
   */
  partition(groupA: Address[], groupB: Address[]): void;

  /** Clears every partition mark. */
  heal(): void;

  isPartitioned(address: Address): boolean;

  isListening(address: Address): boolean;

  listenerCount(): number;
}
