import type { RelayMessage } from "../../../../packages/protocol/src/message.js";
import type { UpdateKind } from "../mirror/dispatch.js";
import type { MirrorEvent } from "../mirror/model.js";

/**
 * What the session does with a response once it arrives
 */
export type ResponseSemantics =
  | { kind: "mirror"; update: UpdateKind }
  | { kind: "info" }
  | { kind: "hdata" }
  | { kind: "pong" };

export type Response = {
  message: RelayMessage;
  events: MirrorEvent[];
};

export type PendingRequest = {
  id: string;
  semantics: ResponseSemantics;
  sentAt: number;
  resolve?: (response: Response) => void;
  reject?: (error: Error) => void;
};

/**
 * RequestTracker correlates responses with the requests that asked for them.
 *
 * Ids are chosen by the client, never start with "_" (reserved for pushes)
 * and are unique for the lifetime of one connection.
 */
export class RequestTracker {
  private inflight: Map<string, PendingRequest> = new Map();
  private nextId: number = 1;

  /**
   * Track a request whose response only feeds the mirror
   */
  expect(semantics: ResponseSemantics, prefix: string = "req"): string {
    const id = this.generateId(prefix);
    this.inflight.set(id, { id, semantics, sentAt: Date.now() });
    return id;
  }

  /**
   * Track a request the caller waits on
   */
  request(
    semantics: ResponseSemantics,
    prefix: string = "req"
  ): { id: string; response: Promise<Response> } {
    const id = this.generateId(prefix);
    const response = new Promise<Response>((resolve, reject) => {
      this.inflight.set(id, { id, semantics, sentAt: Date.now(), resolve, reject });
    });
    return { id, response };
  }

  /**
   * Remove and return the request a message answers, if any
   */
  take(id: string): PendingRequest | undefined {
    const pending = this.inflight.get(id);
    if (pending) {
      this.inflight.delete(id);
    }
    return pending;
  }

  /**
   * Forget a request that could not be sent
   */
  cancel(id: string, error: Error): void {
    this.take(id)?.reject?.(error);
  }

  /**
   * Fail every outstanding request (connection lost)
   */
  rejectAll(error: Error): void {
    const pending = [...this.inflight.values()];
    this.inflight.clear();
    for (const request of pending) {
      request.reject?.(error);
    }
  }

  get size(): number {
    return this.inflight.size;
  }

  private generateId(prefix: string): string {
    return `${prefix}${this.nextId++}`;
  }
}
