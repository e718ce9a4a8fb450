// src/network_builder.ts

import { Address, formatAddress } from "./address";
import { GossipNetConfig, GossipNetOptions, resolveConfig } from "./config";
import { ConnectivityAnalyzer, TopologySnapshot } from "./connectivity";
import { InvalidConfigError, TimeoutError } from "./errors";
import { GossipMessage } from "./gossip";
import { GossipNode } from "./gossip_protocol";
import { InMemoryNetwork, InMemoryNetworkOptions } from "./in_memory_network";
import { Logger, createLogger } from "./logger";
import { Random, randomInt } from "./random";
import { MessageTrace, TraceRecorder } from "./trace";
import { Network } from "./transport";
import {
  VisualizationData,
  buildVisualizationData,
  writeVisualizationData,
} from "./visualization";

export interface GossipInitiation {
  originId: number;
  message: GossipMessage;
}

/**
 * How far a message got, counted over the nodes' received logs.
 */
export interface ReachabilityReport {
  total: number;
  reached: number;
  /** reached / total * 100, 0 for an empty network. */
  percentage: number;
  totalMessagesSent: number;
}

export interface QuiescenceOptions {
  /** Give up after this long. Default: 5000 */
  timeoutMs?: number;
  /** Delay between idle checks. Default: 10 */
  pollMs?: number;
}

/**
 * Builds a network of gossip nodes over a shared Network, wires a random
 * topology and drives network-wide actions. Collects the message traces of
 * every node it creates.
 *
 * @example
 * ```typescript
 * const builder = new NetworkBuilder(new InMemoryNetwork());
 * builder.createNodes(100);
 * builder.buildRandomTopology(2);
 * builder.startAllNodes();
 * builder.initiateGossip("hello");
 * await builder.waitForQuiescence();
 * console.log(builder.reachability());
 * await builder.closeAllNodes();
 * ```
 */
export class NetworkBuilder {
  readonly config: GossipNetConfig;
  private readonly nodes: GossipNode[] = [];
  private readonly traces = new TraceRecorder();
  private readonly startTime = new Date();
  private readonly log: Logger;

  /**
   * @throws InvalidConfigError if `options` carries `queueCapacity`; queue
   * capacity belongs to the network.
   */
  constructor(
    private readonly network: Network,
    options: GossipNetOptions = {},
    private readonly random: Random = Math.random,
  ) {
    if ("queueCapacity" in options) {
      throw new InvalidConfigError(
        "queueCapacity",
        options.queueCapacity,
        "to be set on the network, not the builder",
      );
    }
    this.config = resolveConfig(options);
    this.log = createLogger("NetworkBuilder");
  }

  /**
   * Creates a builder over a fresh InMemoryNetwork. `queueCapacity` goes to
   * the network, everything else to the builder.
   */
  static inMemory(
    options: GossipNetOptions & InMemoryNetworkOptions = {},
    random: Random = Math.random,
  ): NetworkBuilder {
    const { queueCapacity, ...builderOptions } = options;
    const network = new InMemoryNetwork({ queueCapacity });
    return new NetworkBuilder(network, builderOptions, random);
  }

  getNetwork(): Network {
    return this.network;
  }

  /**
   * Creates `count` nodes. Ids continue from the nodes already created;
   * node `i` listens on `host:basePort + i`.
   * @throws AddressInUseError if one of those addresses is taken.
   */
  createNodes(count: number): GossipNode[] {
    this.log.info("Creating gossip nodes", { count });
    const created: GossipNode[] = [];
    const offset = this.nodes.length;
    for (let i = 0; i < count; i++) {
      const node = new GossipNode(this.network, offset + i, this.config, this.traces);
      this.nodes.push(node);
      created.push(node);
    }
    return created;
  }

  private addressOf(id: number): Address {
    return { host: this.config.host, port: this.config.basePort + id };
  }

  private idOf(address: Address): number {
    return address.port - this.config.basePort;
  }

  /**
   * Gives every node up to `peersPerNode` distinct random peers other than
   * itself. Draws are capped at `3 * peersPerNode` per node, so a node may
   * end up with fewer peers when collisions use up the budget.
   */
  buildRandomTopology(peersPerNode: number): void {
    this.log.info("Building random topology", { peersPerNode });
    for (const node of this.nodes) {
      for (const peerId of this.selectRandomPeers(node.id, peersPerNode)) {
        node.addPeer(this.addressOf(peerId));
      }
    }
  }

  /**
   * Picks up to `count` distinct node ids other than `nodeId`.
   */
  selectRandomPeers(nodeId: number, count: number): number[] {
    const peers: number[] = [];
    let attempts = count * 3;

    while (peers.length < count && attempts > 0 && this.nodes.length > 0) {
      attempts--;
      const candidate = this.nodes[randomInt(this.random, this.nodes.length)].id;
      if (candidate !== nodeId && !peers.includes(candidate)) {
        peers.push(candidate);
      }
    }
    return peers;
  }

  startAllNodes(): void {
    this.log.info("Starting nodes", { count: this.nodes.length });
    for (const node of this.nodes) {
      node.start();
    }
  }

  /**
   * Originates `content` from `originId`, or from a node chosen uniformly at
   * random. Returns undefined when there are no nodes.
   */
  initiateGossip(content: string, originId?: number): GossipInitiation | undefined {
    if (this.nodes.length === 0) {
      return undefined;
    }
    const origin =
      originId === undefined
        ? this.nodes[randomInt(this.random, this.nodes.length)]
        : this.getNode(originId);
    if (!origin) {
      return undefined;
    }
    return { originId: origin.id, message: origin.gossip(content) };
  }

  getNodes(): GossipNode[] {
    return [...this.nodes];
  }

  getNode(id: number): GossipNode | undefined {
    return this.nodes.find((n) => n.id === id);
  }

  isIdle(): boolean {
    return this.nodes.every((n) => n.isIdle());
  }

  /**
   * Resolves once every node has been idle on two consecutive checks.
   * Propagation has no completion signal of its own; this is the test
   * harness's deadline.
   * @throws TimeoutError
   */
  async waitForQuiescence(options: QuiescenceOptions = {}): Promise<void> {
    const timeoutMs = options.timeoutMs ?? 5000;
    const pollMs = options.pollMs ?? 10;
    const deadline = Date.now() + timeoutMs;
    let idleChecks = 0;

    while (idleChecks < 2) {
      if (Date.now() > deadline) {
        throw new TimeoutError("wait for gossip to settle", timeoutMs);
      }
      await new Promise((resolve) => setTimeout(resolve, pollMs));
      idleChecks = this.isIdle() ? idleChecks + 1 : 0;
    }
  }

  async closeAllNodes(): Promise<void> {
    await Promise.all(this.nodes.map((n) => n.close()));
    this.log.info("Closed all nodes", { count: this.nodes.length });
  }

  reachability(): ReachabilityReport {
    let reached = 0;
    let totalMessagesSent = 0;
    for (const node of this.nodes) {
      const stats = node.getStats();
      if (stats.received > 0) {
        reached++;
      }
      totalMessagesSent += stats.sent;
    }
    const total = this.nodes.length;
    return {
      total,
      reached,
      percentage: total === 0 ? 0 : (reached / total) * 100,
      totalMessagesSent,
    };
  }

  /**
   * Freezes the current peer graph, with peer addresses resolved to ids.
   * Peers on another host are not part of this network and are left out.
   */
  snapshot(): TopologySnapshot {
    return {
      nodes: this.nodes.map((node) => ({
        id: node.id,
        addr: formatAddress(node.address),
        peers: node
          .getPeers()
          .filter((p) => p.host === this.config.host)
          .map((p) => this.idOf(p)),
      })),
    };
  }

  analyzer(): ConnectivityAnalyzer {
    return new ConnectivityAnalyzer(this.snapshot());
  }

  getTraces(): MessageTrace[] {
    return this.traces.getTraces();
  }

  exportVisualizationData(): VisualizationData {
    return buildVisualizationData(
      this.snapshot(),
      this.traces.getTraces(),
      this.startTime,
      this.random,
      this.config.layout,
    );
  }

  /**
   * Writes the export document to `<outputDir>/network_visualization.json`.
   * @returns The path written.
   */
  async writeVisualizationData(outputDir: string): Promise<string> {
    const data = this.exportVisualizationData();
    const filename = await writeVisualizationData(data, outputDir);
    this.log.info("Exported visualization data", {
      filename,
      nodes: data.topology.nodes.length,
      traces: data.traces.length,
    });
    return filename;
  }
}
