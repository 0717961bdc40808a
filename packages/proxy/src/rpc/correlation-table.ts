/**
 * @mqproxy/proxy - Correlation Table
 * Pending requests keyed by correlation id
 */

import type { Delivery, ReturnedMessage, RpcOutcome } from "../types.js";

/**
 * A request waiting for its replies
 */
export interface PendingRequest {
  correlationId: string;
  /** Number of replies to collect, at least 1 */
  expected: number;
  /** Replies so far, in arrival order */
  deliveries: Delivery[];
  /** Caller handle */
  resolve: (outcome: RpcOutcome) => void;
}

export type MatchResult =
  | { status: "pending"; received: number; expected: number }
  | { status: "complete" }
  | { status: "unknown" };

/**
 * Correlation table owned by a single requester.
 * Each entry resolves exactly once; resolved entries are removed, so late
 * or duplicate events for the same id come back as `unknown`.
 */
export class CorrelationTable {
  private readonly entries = new Map<string, PendingRequest>();

  get size(): number {
    return this.entries.size;
  }

  has(correlationId: string): boolean {
    return this.entries.has(correlationId);
  }

  ids(): string[] {
    return [...this.entries.keys()];
  }

  add(entry: PendingRequest): void {
    if (entry.expected < 1) {
      throw new RangeError(`Pending request ${entry.correlationId} must expect at least one reply`);
    }
    if (this.entries.has(entry.correlationId)) {
      throw new Error(`Correlation id already pending: ${entry.correlationId}`);
    }
    this.entries.set(entry.correlationId, entry);
  }

  remove(correlationId: string): boolean {
    return this.entries.delete(correlationId);
  }

  /**
   * Record a reply; resolves the caller once the expected count is reached
   */
  addDelivery(correlationId: string | undefined, delivery: Delivery): MatchResult {
    const entry = correlationId === undefined ? undefined : this.entries.get(correlationId);
    if (!entry) {
      return { status: "unknown" };
    }

    entry.deliveries.push(delivery);
    if (entry.deliveries.length < entry.expected) {
      return { status: "pending", received: entry.deliveries.length, expected: entry.expected };
    }

    this.entries.delete(entry.correlationId);
    entry.resolve({ kind: "response", deliveries: entry.deliveries });
    return { status: "complete" };
  }

  /**
   * Resolve a request as undelivered, pre-empting any further replies
   */
  markUndelivered(correlationId: string | undefined, returned: ReturnedMessage): boolean {
    const entry = correlationId === undefined ? undefined : this.entries.get(correlationId);
    if (!entry) {
      return false;
    }

    this.entries.delete(entry.correlationId);
    entry.resolve({ kind: "undelivered", returned });
    return true;
  }

  /**
   * Drop every entry without resolving it; returns how many were dropped
   */
  clear(): number {
    const dropped = this.entries.size;
    this.entries.clear();
    return dropped;
  }
}
