// src/trace.ts

/**
 * One accepted gossip hop.
 */
export interface MessageTrace {
  /** ISO 8601 time the receiver accepted the message. */
  timestamp: string;
  messageId: string;
  originalSender: number;
  immediateForwarder: number;
  receiver: number;
  content: string;
  /** ttl as received, before the receiver decremented it. */
  ttl: number;
  /** True when the forwarder is the original sender. */
  isDirect: boolean;
}

/**
 * Where gossip nodes report accepted messages.
 */
export interface TraceSink {
  record(trace: MessageTrace): void;
}

/**
 * Append-only trace log shared by every node of a simulation.
 */
export class TraceRecorder implements TraceSink {
  private readonly traces: MessageTrace[] = [];

  record(trace: MessageTrace): void {
    this.traces.push(trace);
  }

  get size(): number {
    return this.traces.length;
  }

  /**
   * Returns a copy ordered by timestamp; entries with equal timestamps keep
   * their recording order.
   */
  getTraces(): MessageTrace[] {
    return [...this.traces].sort((a, b) =>
      a.timestamp < b.timestamp ? -1 : a.timestamp > b.timestamp ? 1 : 0,
    );
  }

  forMessage(messageId: string): MessageTrace[] {
    return this.getTraces().filter((t) => t.messageId === messageId);
  }

  clear(): void {
    this.traces.length = 0;
  }
}
