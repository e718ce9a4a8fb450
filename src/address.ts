// src/address.ts

/**
 * A logical network address. The only identity used for routing.
 */
export interface Address {
  host: string;
  port: number;
}

/**
 * Formats an address as `host:port`. Also used as the registry key.
 */
export function formatAddress(address: Address): string {
  return `${address.host}:${address.port}`;
}

/**
 * Parses a `host:port` string. Returns undefined when the port is missing or
 * not a valid integer.
 */
export function parseAddress(value: string): Address | undefined {
  const idx = value.lastIndexOf(":");
  if (idx <= 0) {
    return undefined;
  }
  const host = value.slice(0, idx);
  const port = Number(value.slice(idx + 1));
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    return undefined;
  }
  return { host, port };
}

export function sameAddress(a: Address, b: Address): boolean {
  return a.host === b.host && a.port === b.port;
}
