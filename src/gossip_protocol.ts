// src/gossip_protocol.ts

import { EventEmitter } from "events";
import { v4 as uuidv4 } from "uuid";
import { Address, formatAddress, sameAddress } from "./address";
import { DEFAULT_GOSSIP_NET_CONFIG, GossipNetConfig } from "./config";
import {
  GossipKind,
  GossipMessage,
  GossipStats,
  decodeGossipMessage,
  decodePeerList,
  encodeGossipMessage,
  encodePeerList,
} from "./gossip";
import { Logger, createLogger } from "./logger";
import { Message, bodyText } from "./message";
import { Node } from "./node";
import { TaskSet } from "./task_set";
import { TraceSink } from "./trace";
import { Network } from "./transport";

export type GossipNodeConfig = Pick<
  GossipNetConfig,
  "host" | "basePort" | "maxTtl" | "maxPendingTasks"
>;

/**
 * A node taking part in epidemic dissemination.
 *
 * Every message id moves from unseen to seen exactly once per node. Only the
 * first copy of a message is logged, counted, traced and forwarded; later
 * copies are ignored. Forwarded copies carry `ttl - 1`, and a copy that
 * arrives with ttl 0 is not forwarded.
 *
 * Delivery is best effort: forwarding failures are counted and logged, never
 * retried.
 *
 * Events:
 * - 'message_received' (message, immediateForwarder): a new message was accepted
 *
 * @example
 * ```typescript
 * const network = new InMemoryNetwork();
 * const a = new GossipNode(network, 0);
 * const b = new GossipNode(network, 1);
 * a.addPeer(b.address);
 * a.start();
 * b.start();
 * a.gossip("hello");
 * ```
 */
export class GossipNode extends EventEmitter {
  readonly id: number;
  readonly address: Address;

  private readonly node: Node<GossipKind>;
  private readonly config: GossipNodeConfig;
  private readonly trace?: TraceSink;
  private readonly tasks: TaskSet;
  private readonly log: Logger;

  private readonly peers: Address[] = [];
  private readonly seenMessages = new Set<string>();
  private readonly receivedMessages: GossipMessage[] = [];
  private messagesSent = 0;
  private messagesReceived = 0;
  private sendFailures = 0;

  /**
   * Listens on `host:basePort + id`.
   * @throws AddressInUseError if that address is taken.
   */
  constructor(
    network: Network,
    id: number,
    config: GossipNodeConfig = DEFAULT_GOSSIP_NET_CONFIG,
    trace?: TraceSink,
  ) {
    super();
    this.id = id;
    this.config = config;
    this.trace = trace;
    this.address = { host: config.host, port: config.basePort + id };
    this.node = new Node<GossipKind>(network, this.address);
    this.tasks = new TaskSet(config.maxPendingTasks);
    this.log = createLogger("GossipNode", id);

    this.setupHandlers();
  }

  private setupHandlers(): void {
    this.node.handle(GossipKind.Gossip, (msg) => {
      const gossip = decodeGossipMessage(bodyText(msg));
      this.handleGossipMessage(gossip, this.nodeIdOf(msg.from));
    });

    this.node.handle(GossipKind.Discover, (msg) => {
      this.node.reply(msg, GossipKind.Peers, encodePeerList(this.getPeers()));
    });

    this.node.handle(GossipKind.Peers, (msg) => {
      this.handlePeerList(msg);
    });
  }

  private nodeIdOf(address: Address): number {
    return address.port - this.config.basePort;
  }

  private handlePeerList(msg: Message): void {
    const discovered = decodePeerList(bodyText(msg));
    let added = 0;
    for (const peer of discovered) {
      if (this.addPeer(peer)) {
        added++;
      }
    }
    this.log.debug("Merged peer list", {
      from: formatAddress(msg.from),
      offered: discovered.length,
      added,
    });
  }

  /**
   * Adds a peer. Ignores this node's own address and duplicates.
   * @returns true if the peer was added.
   */
  addPeer(address: Address): boolean {
    if (sameAddress(address, this.address)) {
      return false;
    }
    if (this.peers.some((p) => sameAddress(p, address))) {
      return false;
    }
    this.peers.push({ host: address.host, port: address.port });
    return true;
  }

  getPeers(): Address[] {
    return this.peers.map((p) => ({ ...p }));
  }

  /**
   * Asks `address` for its peer list; the answer is merged into ours.
   */
  requestPeers(address: Address): void {
    this.node.send(address, GossipKind.Discover, "");
  }

  start(): void {
    this.node.start();
  }

  /**
   * Originates a new message with a fresh id and the full hop budget and
   * fans it out to every known peer.
   */
  gossip(content: string): GossipMessage {
    const message: GossipMessage = {
      id: uuidv4(),
      content,
      sender: this.id,
      timestamp: new Date().toISOString(),
      ttl: this.config.maxTtl,
    };

    this.log.info("Starting gossip", {
      messageId: message.id,
      content,
      peers: this.peers.length,
    });

    this.spreadGossip(message);
    return message;
  }

  /**
   * Accepts a message the first time its id is seen and forwards it with
   * one hop less, as long as hops remain.
   * @returns true if the message was new to this node.
   */
  handleGossipMessage(message: GossipMessage, immediateForwarder: number): boolean {
    if (this.seenMessages.has(message.id)) {
      return false;
    }

    this.seenMessages.add(message.id);
    this.receivedMessages.push({ ...message });
    this.messagesReceived++;

    const isDirect = message.sender === immediateForwarder;
    this.trace?.record({
      timestamp: new Date().toISOString(),
      messageId: message.id,
      originalSender: message.sender,
      immediateForwarder,
      receiver: this.id,
      content: message.content,
      ttl: message.ttl,
      isDirect,
    });

    if (this.log.isEnabled("debug")) {
      this.log.debug(
        isDirect
          ? `Received gossip from node ${message.sender}`
          : `Received gossip from node ${message.sender} via node ${immediateForwarder}`,
        { messageId: message.id, ttl: message.ttl },
      );
    }
    this.emit("message_received", message, immediateForwarder);

    if (message.ttl > 0) {
      this.spreadGossip({ ...message, ttl: message.ttl - 1 });
    }
    return true;
  }

  /**
   * Sends `message` to every current peer, one tracked task per peer.
   */
  private spreadGossip(message: GossipMessage): void {
    const peers = this.getPeers();
    const body = encodeGossipMessage(message);

    for (const peer of peers) {
      const admitted = this.tasks.spawn(
        () => {
          this.node.send(peer, GossipKind.Gossip, body);
          this.messagesSent++;
        },
        (err) => {
          // Unreachable or partitioned peers are expected in gossip.
          this.sendFailures++;
          this.log.debug("Gossip send failed", {
            to: formatAddress(peer),
            messageId: message.id,
            reason: err instanceof Error ? err.message : String(err),
          });
        },
      );

      if (!admitted) {
        this.sendFailures++;
        this.log.warn("Fan-out dropped", {
          to: formatAddress(peer),
          messageId: message.id,
          pending: this.tasks.size,
          closed: this.tasks.closed,
        });
      }
    }
  }

  hasSeen(messageId: string): boolean {
    return this.seenMessages.has(messageId);
  }

  getReceivedMessages(): GossipMessage[] {
    return this.receivedMessages.map((m) => ({ ...m }));
  }

  getStats(): GossipStats {
    return {
      peers: this.peers.length,
      received: this.receivedMessages.length,
      sent: this.messagesSent,
      messagesReceived: this.messagesReceived,
      sendFailures: this.sendFailures,
    };
  }

  /**
   * True when no message is queued or being handled and no fan-out is
   * outstanding.
   */
  isIdle(): boolean {
    return this.node.isIdle() && this.tasks.size === 0;
  }

  isClosed(): boolean {
    return this.node.isClosed();
  }

  /**
   * Waits for outstanding fan-out tasks, then closes the underlying node.
   */
  async close(): Promise<void> {
    await this.tasks.close();
    await this.node.close();
  }
}
