// src/gossip.ts

import { Address, formatAddress, parseAddress } from "./address";
import { MessageDecodeError } from "./errors";

/**
 * Message kinds exchanged by gossip nodes.
 */
export const GossipKind = {
  /** A rumor being spread. Body: GossipMessage JSON. */
  Gossip: "gossip",
  /** Asks the receiver for its peer list. Body: empty. */
  Discover: "discover",
  /** Answer to Discover. Body: JSON array of "host:port" strings. */
  Peers: "peers",
} as const;

export type GossipKind = (typeof GossipKind)[keyof typeof GossipKind];

/**
 * A piece of information spreading through the network.
 */
export interface GossipMessage {
  /** Unique message identifier. */
  id: string;
  /** The information being spread. */
  content: string;
  /** Id of the node that originated the message. */
  sender: number;
  /** ISO 8601 creation time. */
  timestamp: string;
  /** Forwarding hops remaining. */
  ttl: number;
}

/**
 * Counters exposed by a gossip node.
 */
export interface GossipStats {
  /** Number of known peers. */
  peers: number;
  /** Entries in the received log. */
  received: number;
  /** Successful outbound gossip sends. */
  sent: number;
  /** Distinct messages accepted. */
  messagesReceived: number;
  /** Outbound gossip sends that failed or were dropped. */
  sendFailures: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isGossipMessage(value: unknown): value is GossipMessage {
  return (
    isRecord(value) &&
    typeof value.id === "string" &&
    value.id.length > 0 &&
    typeof value.content === "string" &&
    typeof value.sender === "number" &&
    Number.isInteger(value.sender) &&
    typeof value.timestamp === "string" &&
    typeof value.ttl === "number" &&
    Number.isInteger(value.ttl) &&
    value.ttl >= 0
  );
}

export function encodeGossipMessage(message: GossipMessage): string {
  return JSON.stringify({
    id: message.id,
    content: message.content,
    sender: message.sender,
    timestamp: message.timestamp,
    ttl: message.ttl,
  });
}

function parseJson(kind: string, body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (err) {
    throw new MessageDecodeError(kind, err instanceof Error ? err.message : String(err));
  }
}

/**
 * @throws MessageDecodeError if the body is not a well-formed GossipMessage.
 */
export function decodeGossipMessage(body: string): GossipMessage {
  const value = parseJson(GossipKind.Gossip, body);
  if (!isGossipMessage(value)) {
    throw new MessageDecodeError(GossipKind.Gossip, "missing or invalid fields");
  }
  return value;
}

export function encodePeerList(peers: Address[]): string {
  return JSON.stringify(peers.map(formatAddress));
}

/**
 * @throws MessageDecodeError if the body is not an array of "host:port".
 */
export function decodePeerList(body: string): Address[] {
  const value = parseJson(GossipKind.Peers, body);
  if (!Array.isArray(value)) {
    throw new MessageDecodeError(GossipKind.Peers, "expected an array");
  }

  const peers: Address[] = [];
  for (const entry of value) {
    const address = typeof entry === "string" ? parseAddress(entry) : undefined;
    if (!address) {
      throw new MessageDecodeError(GossipKind.Peers, `invalid address ${JSON.stringify(entry)}`);
    }
    peers.push(address);
  }
  return peers;
}
