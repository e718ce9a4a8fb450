// test/gossip_protocol.test.ts

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  GossipMessage,
  GossipNode,
  HandlerError,
  InMemoryNetwork,
  MessageDecodeError,
  Node,
  TraceRecorder,
  resolveConfig,
} from "../src";
import { captureLogs, settle } from "./helpers";

const config = resolveConfig();

function message(overrides: Partial<GossipMessage> = {}): GossipMessage {
  return {
    id: "msg-1",
    content: "rumor",
    sender: 9,
    timestamp: "2024-01-01T00:00:00.000Z",
    ttl: 5,
    ...overrides,
  };
}

describe("GossipNode", () => {
  const logs = captureLogs();
  let network: InMemoryNetwork;
  let traces: TraceRecorder;
  let nodes: GossipNode[];

  function createNodes(count: number): GossipNode[] {
    const created: GossipNode[] = [];
    for (let i = 0; i < count; i++) {
      created.push(new GossipNode(network, i, config, traces));
    }
    nodes.push(...created);
    return created;
  }

  beforeEach(() => {
    network = new InMemoryNetwork();
    traces = new TraceRecorder();
    nodes = [];
  });

  afterEach(async () => {
    await Promise.all(nodes.map((n) => n.close()));
  });

  it("should listen on basePort + id", () => {
    const [n0, n1] = createNodes(2);
    expect(n0.address).toEqual({ host: "127.0.0.1", port: 8000 });
    expect(n1.address).toEqual({ host: "127.0.0.1", port: 8001 });
    expect(network.isListening(n1.address)).toBe(true);
  });

  it("should ignore its own address and duplicate peers", () => {
    const [n0, n1] = createNodes(2);

    expect(n0.addPeer(n0.address)).toBe(false);
    expect(n0.addPeer(n1.address)).toBe(true);
    expect(n0.addPeer({ host: "127.0.0.1", port: 8001 })).toBe(false);

    expect(n0.getPeers()).toEqual([n1.address]);
    expect(n0.getStats().peers).toBe(1);
  });

  it("should accept a message id only once and forward it only once", async () => {
    const [n0, n1] = createNodes(2);
    n0.addPeer(n1.address);
    n0.start();
    n1.start();

    expect(n0.handleGossipMessage(message(), 9)).toBe(true);
    expect(n0.handleGossipMessage(message(), 9)).toBe(false);
    expect(n0.handleGossipMessage(message({ ttl: 3 }), 4)).toBe(false);
    await settle(nodes);

    expect(n0.getReceivedMessages()).toHaveLength(1);
    expect(n0.hasSeen("msg-1")).toBe(true);
    expect(n0.getStats()).toEqual({
      peers: 1,
      received: 1,
      sent: 1,
      messagesReceived: 1,
      sendFailures: 0,
    });
    expect(n1.getReceivedMessages()).toEqual([message({ ttl: 4 })]);
  });

  it("should decrement ttl by one per hop and stop forwarding at zero", async () => {
    const [n0, n1, n2] = createNodes(3);
    n0.addPeer(n1.address);
    n1.addPeer(n2.address);
    nodes.forEach((n) => n.start());

    n0.handleGossipMessage(message({ ttl: 1 }), 9);
    await settle(nodes);

    expect(n0.getReceivedMessages()[0].ttl).toBe(1);
    expect(n1.getReceivedMessages()[0].ttl).toBe(0);
    expect(n1.getStats().sent).toBe(0);
    expect(n2.getReceivedMessages()).toEqual([]);

    expect(traces.getTraces().map((t) => [t.receiver, t.immediateForwarder, t.ttl, t.isDirect])).toEqual([
      [0, 9, 1, true],
      [1, 0, 0, false],
    ]);
  });

  it("should not forward a message that arrives with ttl 0", async () => {
    const [n0, n1] = createNodes(2);
    n0.addPeer(n1.address);
    n1.start();

    n0.handleGossipMessage(message({ ttl: 0 }), 9);
    await settle(nodes);

    expect(n0.getStats().sent).toBe(0);
    expect(n1.getStats().received).toBe(0);
  });

  it("should originate with a fresh id, its own id as sender and the full hop budget", async () => {
    const [n0, n1, n2] = createNodes(3);
    n0.addPeer(n1.address);
    n0.addPeer(n2.address);
    nodes.forEach((n) => n.start());

    const sent = n0.gossip("hello");
    const again = n0.gossip("hello");
    await settle(nodes);

    expect(sent.id).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(again.id).not.toBe(sent.id);
    expect(sent.sender).toBe(0);
    expect(sent.ttl).toBe(20);
    expect(n0.getStats().sent).toBe(4);

    for (const peer of [n1, n2]) {
      expect(peer.getReceivedMessages().map((m) => [m.id, m.ttl, m.content])).toEqual([
        [sent.id, 20, "hello"],
        [again.id, 20, "hello"],
      ]);
    }
    expect(traces.forMessage(sent.id).every((t) => t.isDirect)).toBe(true);
  });

  it("should receive its own message once when it comes back around a cycle", async () => {
    const [n0, n1, n2] = createNodes(3);
    n0.addPeer(n1.address);
    n1.addPeer(n2.address);
    n2.addPeer(n0.address);
    nodes.forEach((n) => n.start());

    const sent = n0.gossip("round trip");
    await settle(nodes);

    for (const node of nodes) {
      expect(node.getReceivedMessages().map((m) => m.id)).toEqual([sent.id]);
    }
    expect(n0.getReceivedMessages()[0].ttl).toBe(18);
    expect(n0.getStats().sent).toBe(2);
    expect(n1.getStats().sent).toBe(1);
    expect(n2.getStats().sent).toBe(1);
  });

  it("should count and swallow forwarding failures", async () => {
    const [n0, n1] = createNodes(2);
    n0.addPeer(n1.address);
    n0.addPeer({ host: "127.0.0.1", port: 8099 });
    network.partition([n1.address], []);
    n0.start();

    expect(() => n0.gossip("lost")).not.toThrow();
    await settle(nodes);

    expect(n0.getStats().sent).toBe(0);
    expect(n0.getStats().sendFailures).toBe(2);
    expect(n1.getStats().received).toBe(0);
    const reasons = logs
      .filter((e) => e.message === "Gossip send failed")
      .map((e) => e.context.reason);
    expect(reasons).toEqual([
      "Network partitioned between 127.0.0.1:8000 and 127.0.0.1:8001",
      "No listener at address 127.0.0.1:8099",
    ]);
  });

  it("should emit message_received for new messages only", async () => {
    const [n0] = createNodes(1);
    const listener = vi.fn();
    n0.on("message_received", listener);

    n0.handleGossipMessage(message(), 3);
    n0.handleGossipMessage(message(), 3);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(message(), 3);
  });

  it("should share its peer list on discover", async () => {
    const [n0, n1, n2] = createNodes(3);
    n0.addPeer(n1.address);
    n0.addPeer(n2.address);
    n0.start();
    n1.start();

    n1.requestPeers(n0.address);
    await settle(nodes);

    expect(n1.getPeers()).toEqual([n2.address]);
    expect(n0.getPeers()).toEqual([n1.address, n2.address]);
  });

  it("should log undecodable gossip and keep running", async () => {
    const [n0] = createNodes(1);
    n0.start();
    const rogue = new Node<"gossip">(network, { host: "127.0.0.1", port: 9000 });

    rogue.sendString(n0.address, "gossip", "not json");
    rogue.sendString(n0.address, "gossip", JSON.stringify({ id: "x", ttl: -1 }));
    rogue.sendString(n0.address, "gossip", JSON.stringify(message()));
    await settle(nodes);

    const failures = logs.filter((e) => e.level === "error");
    expect(failures).toHaveLength(2);
    for (const failure of failures) {
      expect(failure.error).toBeInstanceOf(HandlerError);
      const cause = failure.error instanceof HandlerError ? failure.error.originalCause : undefined;
      expect(cause).toBeInstanceOf(MessageDecodeError);
    }
    expect(n0.getReceivedMessages()).toEqual([message()]);
    expect(traces.getTraces()[0].immediateForwarder).toBe(1000);

    await rogue.close();
  });

  it("should release its address on close", async () => {
    const [n0] = createNodes(1);
    n0.start();

    await n0.close();

    expect(n0.isClosed()).toBe(true);
    expect(network.isListening(n0.address)).toBe(false);
  });
});
