// src/errors.ts

import { Address, formatAddress } from "./address";

/**
 * Base error class for all gossipnet errors.
 */
export class GossipNetError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "GossipNetError";
  }
}

/**
 * Error thrown when listening on an address that already has a listener.
 */
export class AddressInUseError extends GossipNetError {
  constructor(address: Address) {
    super(
      `Address already in use: ${formatAddress(address)}`,
      "ADDRESS_IN_USE",
      { address: formatAddress(address) },
    );
    this.name = "AddressInUseError";
  }
}

/**
 * Error thrown when dialing or sending to an address nobody listens on.
 */
export class AddressNotFoundError extends GossipNetError {
  constructor(address: Address) {
    super(
      `No listener at address ${formatAddress(address)}`,
      "ADDRESS_NOT_FOUND",
      { address: formatAddress(address) },
    );
    this.name = "AddressNotFoundError";
  }
}

/**
 * Error thrown when either end of a send is cut off by a partition.
 */
export class NetworkPartitionedError extends GossipNetError {
  constructor(from: Address, to: Address) {
    super(
      `Network partitioned between ${formatAddress(from)} and ${formatAddress(to)}`,
      "NETWORK_PARTITIONED",
      { from: formatAddress(from), to: formatAddress(to) },
    );
    this.name = "NetworkPartitionedError";
  }
}

/**
 * Error thrown when the receiver's inbound queue is at capacity.
 */
export class QueueFullError extends GossipNetError {
  constructor(address: Address, capacity: number) {
    super(
      `Inbound queue full at ${formatAddress(address)} (capacity ${capacity})`,
      "QUEUE_FULL",
      { address: formatAddress(address), capacity },
    );
    this.name = "QueueFullError";
  }
}

/**
 * Error thrown when using a connection, handle or node after it was closed.
 */
export class ConnectionClosedError extends GossipNetError {
  constructor(operation: string, address?: Address) {
    super(
      `Cannot ${operation}: connection closed${address ? ` (${formatAddress(address)})` : ""}`,
      "CONNECTION_CLOSED",
      { operation, address: address ? formatAddress(address) : undefined },
    );
    this.name = "ConnectionClosedError";
  }
}

/**
 * Error raised when a message handler fails. Non-fatal: the dispatch loop
 * logs it and keeps running.
 */
export class HandlerError extends GossipNetError {
  readonly originalCause?: Error;

  constructor(kind: string, address: Address, cause?: Error) {
    super(
      `Handler for "${kind}" failed on ${formatAddress(address)}${cause ? `: ${cause.message}` : ""}`,
      "HANDLER_ERROR",
      { kind, address: formatAddress(address), cause: cause?.message },
    );
    this.name = "HandlerError";
    this.originalCause = cause;
  }
}

/**
 * Error thrown when a message body cannot be decoded.
 */
export class MessageDecodeError extends GossipNetError {
  constructor(kind: string, reason: string) {
    super(`Failed to decode "${kind}" message: ${reason}`, "MESSAGE_DECODE_FAILED", {
      kind,
      reason,
    });
    this.name = "MessageDecodeError";
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends GossipNetError {
  constructor(operation: string, timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`, "TIMEOUT", {
      operation,
      timeoutMs,
    });
    this.name = "TimeoutError";
  }
}

/**
 * Error thrown when a configuration value is out of range.
 */
export class InvalidConfigError extends GossipNetError {
  constructor(key: string, value: unknown, expected: string) {
    super(
      `Invalid configuration for ${key}: ${String(value)} (expected ${expected})`,
      "INVALID_CONFIG",
      { key, value, expected },
    );
    this.name = "InvalidConfigError";
  }
}
