// src/node.ts

import { Address, formatAddress } from "./address";
import { ConnectionClosedError, HandlerError } from "./errors";
import { Logger, createLogger } from "./logger";
import {
  DEFAULT_KIND,
  DefaultKind,
  Message,
  MessageBody,
  encodePayload,
  extractKind,
} from "./message";
import { Connection, Network } from "./transport";

/**
 * The handler for an inbound message. Thrown errors and rejections are
 * caught by the receive loop.
 */
export type MessageHandler = (message: Message) => void | Promise<void>;

/**
 * Per-address message dispatcher.
 *
 * `K` is the set of message kinds this node sends and handles; the dispatch
 * table is keyed by it (plus the "default" fallback).
 *
 * @example
 * ```typescript
 * const node = new Node<"ping" | "pong">(network, { host: "127.0.0.1", port: 8080 });
 * node.handle("ping", (msg) => node.replyString(msg, "pong", "hi"));
 * node.start();
 * ```
 */
export class Node<K extends string = string> {
  private readonly connection: Connection;
  private readonly handlers = new Map<string, MessageHandler>();
  private readonly log: Logger;
  private loop?: Promise<void>;
  private dispatching = false;
  private _closed = false;

  /**
   * Registers `address` on the network.
   * @throws AddressInUseError if another listener holds the address.
   */
  constructor(
    private readonly network: Network,
    readonly address: Address,
  ) {
    this.connection = network.listen(address);
    this.log = createLogger("Node").child({ address: formatAddress(address) });
  }

  isClosed(): boolean {
    return this._closed;
  }

  isRunning(): boolean {
    return this.loop !== undefined && !this._closed;
  }

  /**
   * Registers the handler for `kind`, replacing any earlier one.
   */
  handle(kind: K | DefaultKind, handler: MessageHandler): void {
    this.handlers.set(kind, handler);
  }

  /**
   * Starts the receive loop. Calling it again is a no-op.
   */
  start(): void {
    if (this._closed) {
      throw new ConnectionClosedError("start node", this.address);
    }
    if (this.loop) {
      return;
    }
    this.loop = this.receiveLoop();
  }

  private async receiveLoop(): Promise<void> {
    for (;;) {
      const message = await this.connection.receive();
      if (message === undefined) {
        break;
      }
      this.dispatching = true;
      try {
        await this.dispatch(message);
      } finally {
        this.dispatching = false;
      }
    }
    this.log.debug("Receive loop stopped");
  }

  private async dispatch(message: Message): Promise<void> {
    const kind = extractKind(message.payload);
    const handler = this.handlers.get(kind) ?? this.handlers.get(DEFAULT_KIND);

    if (!handler) {
      this.log.warn("No handler for message, dropping", {
        kind,
        from: formatAddress(message.from),
      });
      return;
    }

    try {
      await handler(message);
    } catch (err) {
      const error = new HandlerError(
        kind,
        this.address,
        err instanceof Error ? err : new Error(String(err)),
      );
      this.log.error("Message handler failed", error, {
        kind,
        from: formatAddress(message.from),
      });
    }
  }

  /**
   * Sends `"<kind>:<body>"` to `to`. Dials a fresh handle for every send and
   * releases it afterwards.
   *
   * Transport failures are thrown to the caller.
   */
  send(to: Address, kind: K, body: MessageBody): void {
    if (this._closed) {
      throw new ConnectionClosedError("send", this.address);
    }

    const handle = this.network.dial(to);
    try {
      handle.send({ from: this.address, to, payload: encodePayload(kind, body) });
    } finally {
      handle.close();
    }
  }

  sendString(to: Address, kind: K, text: string): void {
    this.send(to, kind, text);
  }

  /**
   * Sends to the sender of `message`.
   */
  reply(message: Message, kind: K, body: MessageBody): void {
    this.send(message.from, kind, body);
  }

  replyString(message: Message, kind: K, text: string): void {
    this.send(message.from, kind, text);
  }

  /** Messages waiting in the inbound queue. */
  pendingMessages(): number {
    return this.connection.pending();
  }

  /**
   * True when nothing is queued and no handler is running.
   */
  isIdle(): boolean {
    return !this.dispatching && this.connection.pending() === 0;
  }

  /**
   * Stops the receive loop and deregisters the address. Idempotent; resolves
   * once the loop has exited.
   */
  async close(): Promise<void> {
    if (!this._closed) {
      this._closed = true;
      this.connection.close();
    }
    if (this.loop) {
      await this.loop;
    }
  }
}
