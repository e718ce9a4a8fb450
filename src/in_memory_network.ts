// src/in_memory_network.ts

import { EventEmitter } from "events";
import { Address, formatAddress } from "./address";
import {
  AddressInUseError,
  AddressNotFoundError,
  ConnectionClosedError,
  InvalidConfigError,
  NetworkPartitionedError,
} from "./errors";
import { Logger, createLogger } from "./logger";
import { Message } from "./message";
import { MessageQueue } from "./message_queue";
import { Connection, Network, OutboundHandle } from "./transport";

export const DEFAULT_QUEUE_CAPACITY = 100;

export interface InMemoryNetworkOptions {
  /** Inbound queue capacity per listener. Default: 100 */
  queueCapacity?: number;
}

/**
 * An in-memory implementation of the Network interface. Owned by whoever
 * builds the simulation and passed by reference into every node.
 *
 * Delivery is synchronous: a send either lands in the receiver's queue before
 * it returns or throws, so a queue cannot be released halfway through a
 * delivery.
 *
 * Events:
 * - 'listen' (address): a listener was registered
 * - 'close' (address): a listener was deregistered
 * - 'partition' (addresses): addresses were marked
 * - 'heal': all marks were cleared
 */
export class InMemoryNetwork extends EventEmitter implements Network {
  private readonly listenerQueues = new Map<string, MessageQueue<Message>>();
  private readonly partitioned = new Set<string>();
  private readonly queueCapacity: number;
  private readonly log: Logger;

  constructor(options: InMemoryNetworkOptions = {}) {
    super();
    const queueCapacity = options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY;
    if (!Number.isInteger(queueCapacity) || queueCapacity < 1) {
      throw new InvalidConfigError("queueCapacity", queueCapacity, "an integer >= 1");
    }
    this.queueCapacity = queueCapacity;
    this.log = createLogger("InMemoryNetwork");
  }

  listen(address: Address): Connection {
    const key = formatAddress(address);
    if (this.listenerQueues.has(key)) {
      throw new AddressInUseError(address);
    }

    const queue = new MessageQueue<Message>(address, this.queueCapacity);
    this.listenerQueues.set(key, queue);
    this.log.debug("Listening", { address: key });
    this.emit("listen", address);

    return {
      address,
      receive: () => queue.shift(),
      pending: () => queue.size,
      isClosed: () => queue.closed,
      close: () => {
        if (queue.closed) {
          return;
        }
        // Only deregister our own queue; the address may have been reused.
        if (this.listenerQueues.get(key) === queue) {
          this.listenerQueues.delete(key);
        }
        queue.close();
        this.log.debug("Listener closed", { address: key });
        this.emit("close", address);
      },
    };
  }

  dial(address: Address): OutboundHandle {
    if (!this.listenerQueues.has(formatAddress(address))) {
      throw new AddressNotFoundError(address);
    }

    let released = false;
    return {
      target: address,
      send: (message: Message) => {
        if (released) {
          throw new ConnectionClosedError("send", address);
        }
        this.deliver(message);
      },
      close: () => {
        released = true;
      },
    };
  }

  private deliver(message: Message): void {
    const fromKey = formatAddress(message.from);
    const toKey = formatAddress(message.to);

    if (this.partitioned.has(fromKey) || this.partitioned.has(toKey)) {
      throw new NetworkPartitionedError(message.from, message.to);
    }

    const queue = this.listenerQueues.get(toKey);
    if (!queue) {
      throw new AddressNotFoundError(message.to);
    }
    queue.push(message);
  }

  partition(groupA: Address[], groupB: Address[]): void {
    const marked = [...groupA, ...groupB];
    for (const address of marked) {
      this.partitioned.add(formatAddress(address));
    }
    this.log.info("Partitioned addresses", { count: marked.length });
    this.emit("partition", marked);
  }

  heal(): void {
    const count = this.partitioned.size;
    this.partitioned.clear();
    this.log.info("Healed network", { cleared: count });
    this.emit("heal");
  }

  isPartitioned(address: Address): boolean {
    return this.partitioned.has(formatAddress(address));
  }

  isListening(address: Address): boolean {
    return this.listenerQueues.has(formatAddress(address));
  }

  listenerCount(): number {
    return this.listenerQueues.size;
  }
}
