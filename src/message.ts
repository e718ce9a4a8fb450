// src/message.ts

import { Address } from "./address";

/** Separates the kind tag from the body in a payload. */
export const KIND_DELIMITER = ":";

/** Handler key used when no handler is registered for a message's kind. */
export const DEFAULT_KIND = "default";
export type DefaultKind = typeof DEFAULT_KIND;

/**
 * A message in flight between two addresses.
 * The payload is `"<kind>:<body>"`; only the first colon delimits.
 */
export interface Message {
  from: Address;
  to: Address;
  payload: Buffer;
}

export type MessageBody = string | Uint8Array;

/**
 * Builds a tagged payload.
 */
export function encodePayload(kind: string, body: MessageBody): Buffer {
  const bodyBuffer = typeof body === "string" ? Buffer.from(body, "utf8") : Buffer.from(body);
  return Buffer.concat([Buffer.from(`${kind}${KIND_DELIMITER}`, "utf8"), bodyBuffer]);
}

/**
 * Returns the text before the first delimiter, or the whole payload when it
 * has none.
 */
export function extractKind(payload: Buffer): string {
  const idx = payload.indexOf(KIND_DELIMITER);
  return (idx === -1 ? payload : payload.subarray(0, idx)).toString("utf8");
}

/**
 * Returns the bytes after the first delimiter, or the whole payload when it
 * has none.
 */
export function extractBody(payload: Buffer): Buffer {
  const idx = payload.indexOf(KIND_DELIMITER);
  return idx === -1 ? payload : payload.subarray(idx + 1);
}

export function bodyText(message: Message): string {
  return extractBody(message.payload).toString("utf8");
}
