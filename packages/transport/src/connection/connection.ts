import type { Duplex } from "stream";
import { EventEmitter } from "events";
import { MessageFramer } from "../../../protocol/src/framer.js";
import { formatCommand, type Command } from "../../../protocol/src/commands.js";
import type { RelayMessage } from "../../../protocol/src/message.js";
import {
  MalformedFrameError,
  TypeMismatchError,
} from "../../../protocol/src/errors.js";

export enum ConnectionState {
  INIT = "INIT",
  OPEN = "OPEN",
  DRAINING = "DRAINING",
  CLOSING = "CLOSING",
  CLOSED = "CLOSED",
}

export type ConnectionErrorType = "transport" | "malformed-frame" | "type-mismatch";

export type ConnectionErrorEvent = {
  type: ConnectionErrorType;
  reason: string;
  fatal: boolean;
  error: Error;
};

export type ConnectionCloseEvent = {
  /** True when no byte was ever received */
  silent: boolean;
  bytesSent: number;
  bytesReceived: number;
};

export interface ConnectionEvents {
  message: (message: RelayMessage, raw: Buffer) => void;
  drain: () => void;
  error: (error: ConnectionErrorEvent) => void;
  close: (event: ConnectionCloseEvent) => void;
  state: (state: ConnectionState) => void;
}

export declare interface RelayConnection {
  on<E extends keyof ConnectionEvents>(event: E, listener: ConnectionEvents[E]): this;
  once<E extends keyof ConnectionEvents>(event: E, listener: ConnectionEvents[E]): this;
  off<E extends keyof ConnectionEvents>(event: E, listener: ConnectionEvents[E]): this;
  emit<E extends keyof ConnectionEvents>(
    event: E,
    ...args: Parameters<ConnectionEvents[E]>
  ): boolean;
}

/**
 * RelayConnection represents one transport connection to a relay.
 *
 * Responsibilities:
 * - Receive buffering and incremental frame parsing (one framer per connection)
 * - Backpressure tracking for outbound commands
 * - State machine enforcement (INIT → OPEN ⟷ DRAINING → CLOSING → CLOSED)
 * - Event emission for decoded messages
 *
 * Does NOT:
 * - Interpret message semantics
 * - Track requests or mirror state
 * - Reconnect
 */
export class RelayConnection extends EventEmitter {
  private socket: Duplex;
  private state: ConnectionState = ConnectionState.INIT;
  public readonly connectionId: string;

  private framer = new MessageFramer();

  // Statistics
  private bytesSent: number = 0;
  private bytesReceived: number = 0;
  private messagesReceived: number = 0;
  private commandsSent: number = 0;

  constructor(socket: Duplex, connectionId: string) {
    super();
    this.socket = socket;
    this.connectionId = connectionId;
    this.wireSocket();
    this.transition(ConnectionState.OPEN);
  }

  /**
   * Bind socket events to Connection behavior
   */
  private wireSocket(): void {
    this.socket.on("data", (chunk: Buffer) => {
      if (this.state === ConnectionState.CLOSED) return;
      this.bytesReceived += chunk.length;
      this.onData(chunk);
    });

    this.socket.on("drain", () => {
      if (this.state === ConnectionState.DRAINING) {
        this.transition(ConnectionState.OPEN);
        this.emit("drain");
      }
    });

    // Remote side finished sending
    this.socket.on("end", () => {
      this.close();
    });

    this.socket.on("close", () => {
      this.handleClose();
    });

    this.socket.on("error", (err: Error) => {
      this.fail("transport", err);
    });
  }

  /**
   * Handle incoming data chunk
   */
  private onData(chunk: Buffer): void {
    this.framer.append(chunk);
    this.parse();
  }

  /**
   * Extract and emit every complete message, in arrival order.
   *
   * A malformed frame or a listener rejecting a message's structure is
   * fatal: nothing after it is delivered and the connection closes.
   */
  private parse(): void {
    while (this.state === ConnectionState.OPEN || this.state === ConnectionState.DRAINING) {
      try {
        const result = this.framer.next();
        if (result.status === "incomplete") {
          return;
        }
        this.messagesReceived++;
        this.emit("message", result.message, result.raw);
      } catch (err) {
        if (err instanceof MalformedFrameError) {
          this.fail("malformed-frame", err);
        } else if (err instanceof TypeMismatchError) {
          this.fail("type-mismatch", err);
        } else {
          throw err;
        }
        return;
      }
    }
  }

  /**
   * Send a command to the relay
   */
  send(command: Command): boolean {
    if (
      this.state !== ConnectionState.OPEN &&
      this.state !== ConnectionState.DRAINING
    ) {
      return false;
    }

    const line = formatCommand(command);
    const bytes = Buffer.byteLength(line, "utf8");
    this.bytesSent += bytes;
    this.commandsSent++;

    const canWrite = this.socket.write(line, "utf8");
    if (!canWrite && this.state === ConnectionState.OPEN) {
      this.transition(ConnectionState.DRAINING);
    }
    return true;
  }

  /**
   * Close the connection gracefully
   */
  close(): void {
    if (
      this.state === ConnectionState.CLOSING ||
      this.state === ConnectionState.CLOSED
    ) {
      return;
    }

    this.transition(ConnectionState.CLOSING);
    this.socket.end(() => this.socket.destroy());
  }

  /**
   * Emit a fatal error and tear the connection down
   */
  private fail(type: ConnectionErrorType, error: Error): void {
    if (this.state === ConnectionState.CLOSED) return;
    this.emit("error", { type, reason: error.message, fatal: true, error });
    this.close();
  }

  /**
   * Handle socket close event
   */
  private handleClose(): void {
    if (this.state === ConnectionState.CLOSED) return;

    this.transition(ConnectionState.CLOSED);
    this.emit("close", {
      silent: this.bytesReceived === 0,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
    });
  }

  /**
   * Transition to a new state
   */
  private transition(next: ConnectionState): void {
    if (this.state === next) return;

    const allowed = this.isTransitionAllowed(this.state, next);
    if (!allowed) {
      throw new Error(`Invalid state transition: ${this.state} → ${next}`);
    }

    this.state = next;
    this.emit("state", next);
  }

  /**
   * Check if a state transition is valid
   */
  private isTransitionAllowed(
    from: ConnectionState,
    to: ConnectionState
  ): boolean {
    const transitions: Record<ConnectionState, ConnectionState[]> = {
      [ConnectionState.INIT]: [ConnectionState.OPEN],
      [ConnectionState.OPEN]: [
        ConnectionState.DRAINING,
        ConnectionState.CLOSING,
        ConnectionState.CLOSED,
      ],
      [ConnectionState.DRAINING]: [
        ConnectionState.OPEN,
        ConnectionState.CLOSING,
        ConnectionState.CLOSED,
      ],
      [ConnectionState.CLOSING]: [ConnectionState.CLOSED],
      [ConnectionState.CLOSED]: [],
    };

    return transitions[from]?.includes(to) ?? false;
  }

  /**
   * Get current connection state
   */
  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Get connection statistics
   */
  getStats() {
    return {
      connectionId: this.connectionId,
      state: this.state,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      messagesReceived: this.messagesReceived,
      commandsSent: this.commandsSent,
      bufferSize: this.framer.bufferedBytes,
    };
  }
}
