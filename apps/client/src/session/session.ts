import { EventEmitter } from "events";
import type { Duplex } from "stream";
import {
  ConnectionState,
  RelayConnection,
  type ConnectionCloseEvent,
  type ConnectionErrorEvent,
} from "../../../../packages/transport/src/connection/connection.js";
import { dial, type Dialer } from "../../../../packages/transport/src/dial.js";
import { ConnectionError } from "../../../../packages/transport/src/errors.js";
import {
  desyncCommand,
  hdataCommand,
  infoCommand,
  initCommand,
  inputCommand,
  nicklistCommand,
  pingCommand,
  quitCommand,
  syncCommand,
  type Command,
} from "../../../../packages/protocol/src/commands.js";
import type { RelayMessage } from "../../../../packages/protocol/src/message.js";
import type { HData } from "../../../../packages/protocol/src/types.js";
import {
  parseConnectOptions,
  type ConnectOptions,
  type ConnectOptionsInput,
} from "../config.js";
import { DomainMirror } from "../mirror/mirror.js";
import type { MirrorEvent } from "../mirror/model.js";
import { Logger, logger as defaultLogger } from "../observability/logger.js";
import { Metrics } from "../observability/metrics.js";
import { RequestTracker, type Response, type ResponseSemantics } from "./requests.js";

export enum SessionState {
  DISCONNECTED = "DISCONNECTED",
  CONNECTING = "CONNECTING",
  HANDSHAKING = "HANDSHAKING",
  AUTHENTICATED = "AUTHENTICATED",
  ACTIVE = "ACTIVE",
  CLOSING = "CLOSING",
}

export type SessionErrorType = "connection" | "malformed-frame" | "type-mismatch";

export type SessionErrorEvent = {
  type: SessionErrorType;
  reason: string;
  fatal: boolean;
  error: Error;
};

export type DisconnectedEvent = {
  reason: string;
  error?: SessionErrorEvent;
};

export interface SessionEvents {
  state: (state: SessionState, previous: SessionState) => void;
  message: (message: RelayMessage) => void;
  change: (event: MirrorEvent) => void;
  error: (error: SessionErrorEvent) => void;
  disconnected: (event: DisconnectedEvent) => void;
}

export declare interface RelaySession {
  on<E extends keyof SessionEvents>(event: E, listener: SessionEvents[E]): this;
  once<E extends keyof SessionEvents>(event: E, listener: SessionEvents[E]): this;
  off<E extends keyof SessionEvents>(event: E, listener: SessionEvents[E]): this;
  emit<E extends keyof SessionEvents>(event: E, ...args: Parameters<SessionEvents[E]>): boolean;
}

export type SessionOptions = {
  dial?: Dialer;
  mirror?: DomainMirror;
  logger?: Logger;
};

// Keys requested for buffers and lines when syncing
export const BUFFER_KEYS = [
  "number",
  "full_name",
  "short_name",
  "type",
  "nicklist",
  "title",
  "local_variables",
] as const;

export const LINE_KEYS = [
  "date",
  "date_printed",
  "displayed",
  "highlight",
  "prefix",
  "message",
  "tags_array",
] as const;

const WRITABLE_STATES: readonly SessionState[] = [
  SessionState.HANDSHAKING,
  SessionState.AUTHENTICATED,
  SessionState.ACTIVE,
];

let nextSessionId = 1;

/**
 * RelaySession drives one connection to a WeeChat relay at a time.
 *
 * Lifecycle:
 * DISCONNECTED → CONNECTING → HANDSHAKING → AUTHENTICATED → ACTIVE → CLOSING → DISCONNECTED
 *
 * The relay never acknowledges init: a wrong password or one-time password
 * makes it close the socket. AUTHENTICATED is therefore reached as soon as
 * init is written, and a close the client did not ask for is reported as a
 * connection error.
 *
 * Responsibilities:
 * - Transport lifecycle (a fresh connection and framer per connect)
 * - Outbound commands and request/response correlation
 * - Routing responses and pushes to the mirror, in arrival order
 * - Reporting one structured error per failed connection
 */
export class RelaySession extends EventEmitter {
  public readonly sessionId: string;
  public readonly mirror: DomainMirror;

  private state: SessionState = SessionState.DISCONNECTED;
  private readonly dialer: Dialer;
  private readonly logger: Logger;
  private readonly metrics = new Metrics();

  // Per-connection state, reset on every disconnect
  private connection: RelayConnection | null = null;
  private requests = new RequestTracker();
  private options: ConnectOptions | null = null;
  private disconnectRequested = false;
  private receivedData = false;
  private fatalError: SessionErrorEvent | null = null;

  constructor(options: SessionOptions = {}) {
    super();
    this.sessionId = `session-${nextSessionId++}`;
    this.dialer = options.dial ?? dial;
    this.logger = options.logger ?? defaultLogger;
    this.mirror = options.mirror ?? new DomainMirror(this.logger);

    this.mirror.on("change", (event) => this.emit("change", event));
  }

  /**
   * Connect, authenticate and sync
   *
   * Resolves once the session is ACTIVE. Rejects with a ConnectionError when
   * the transport cannot be opened, or with a ZodError for invalid options.
   */
  async connect(input: ConnectOptionsInput): Promise<void> {
    if (this.state !== SessionState.DISCONNECTED) {
      throw new ConnectionError(`Cannot connect while ${this.state}`, { code: "EISCONN" });
    }

    const options = parseConnectOptions(input);
    this.options = options;
    this.disconnectRequested = false;
    this.receivedData = false;
    this.fatalError = null;
    this.requests = new RequestTracker();

    // Retained data is only kept until a new sync starts
    this.mirror.reset();

    this.transition(SessionState.CONNECTING, `${options.host}:${options.port}`);

    let socket: Duplex;
    try {
      socket = await this.dialer({
        host: options.host,
        port: options.port,
        tls: options.tls,
        rejectUnauthorized: options.verifyCertificate,
        timeoutMs: options.connectTimeout,
      });
    } catch (err) {
      const error =
        err instanceof ConnectionError
          ? err
          : new ConnectionError(err instanceof Error ? err.message : String(err), { cause: err });
      this.finishConnectFailure(error);
      throw error;
    }

    if (this.disconnectRequested) {
      socket.destroy();
      const error = new ConnectionError("Connection cancelled", { code: "ECANCELED" });
      this.transition(SessionState.DISCONNECTED, error.message);
      this.emit("disconnected", { reason: error.message });
      throw error;
    }

    this.metrics.connected();
    this.connection = this.createConnection(socket);
    this.logger.session(this.sessionId, "Connected", {
      host: options.host,
      port: options.port,
      tls: options.tls,
    });

    this.transition(SessionState.HANDSHAKING);
    this.send(
      initCommand({
        password: options.password,
        compression: options.compression,
        totp: options.totp,
      })
    );

    // No acknowledgement exists for init
    this.transition(SessionState.AUTHENTICATED, "init sent");

    this.sendSync();
    this.transition(SessionState.ACTIVE, "sync requested");
  }

  /**
   * Disconnect. Safe in any state; resolves once DISCONNECTED.
   */
  async disconnect(): Promise<void> {
    if (this.state === SessionState.DISCONNECTED) return;

    const done = new Promise<void>((resolve) => {
      this.once("disconnected", () => resolve());
    });

    const connection = this.connection;
    if (!connection) {
      // Still dialing: connect() sees the flag once the socket arrives
      this.disconnectRequested = true;
    } else if (this.state !== SessionState.CLOSING) {
      // A relay that already hung up gets no quit and its close is still reported
      const writable = [ConnectionState.OPEN, ConnectionState.DRAINING].includes(
        connection.getState()
      );
      if (writable) {
        this.disconnectRequested = true;
        this.send(quitCommand());
      }
      this.transition(SessionState.CLOSING, "disconnect requested");
      connection.close();
    }

    await done;
  }

  /**
   * Send text (or a WeeChat command such as "/join #chan") to a buffer
   */
  sendInput(buffer: string, text: string): void {
    this.ensureWritable();
    this.send(inputCommand(buffer, text));
  }

  /**
   * Fetch `count` lines older than the ones already mirrored
   *
   * @returns Pointers of the lines prepended to the buffer, oldest first
   */
  async fetchMoreLines(buffer: string, count: number): Promise<string[]> {
    if (!Number.isInteger(count) || count <= 0) {
      throw new RangeError(`Line count must be a positive integer, got ${count}`);
    }
    const known = this.mirror.getBuffer(buffer)?.lines.length ?? 0;
    const { events } = await this.request(
      { kind: "mirror", update: "history" },
      (id) =>
        hdataCommand(
          `buffer:${buffer}/own_lines/last_line(-${known + count})/data`,
          LINE_KEYS,
          id
        )
    );
    return events.flatMap((event) =>
      event.type === "lines-prepended" && event.buffer === buffer ? [...event.lines] : []
    );
  }

  /**
   * Ask the relay for an info value (e.g. "version")
   */
  async requestInfo(name: string): Promise<string | null> {
    const { message } = await this.request({ kind: "info" }, (id) => infoCommand(name, id));
    return message.expect("inf").value;
  }

  /**
   * Run an arbitrary hdata query
   */
  async requestHData(path: string, keys?: readonly string[]): Promise<HData> {
    const { message } = await this.request({ kind: "hdata" }, (id) =>
      hdataCommand(path, keys, id)
    );
    return message.expectHData();
  }

  /**
   * Refresh nicklists (all buffers, or one) into the mirror
   */
  async requestNicklist(buffer?: string): Promise<MirrorEvent[]> {
    const { events } = await this.request(
      { kind: "mirror", update: "nicklist" },
      (id) => nicklistCommand(buffer, id)
    );
    return events;
  }

  /**
   * Subscribe to updates (all buffers when none are given)
   */
  sync(buffers?: readonly string[]): void {
    this.ensureWritable();
    this.send(syncCommand(buffers));
  }

  /**
   * Stop updates (all buffers when none are given)
   */
  desync(buffers?: readonly string[]): void {
    this.ensureWritable();
    this.send(desyncCommand(buffers));
  }

  /**
   * Round trip through the relay
   *
   * @returns Elapsed milliseconds
   */
  async ping(): Promise<number> {
    const startedAt = Date.now();
    await this.request({ kind: "pong" }, (id) => pingCommand(id), "ping");
    return Date.now() - startedAt;
  }

  getState(): SessionState {
    return this.state;
  }

  /**
   * Compression requested for the current connection, if any
   */
  getCompression(): ConnectOptions["compression"] | null {
    return this.options?.compression ?? null;
  }

  getStats() {
    return {
      sessionId: this.sessionId,
      state: this.state,
      pendingRequests: this.requests.size,
      buffers: this.mirror.size,
      connection: this.connection?.getStats() ?? null,
      ...this.metrics.getSnapshot(),
    };
  }

  /**
   * Wire a fresh connection
   */
  private createConnection(socket: Duplex): RelayConnection {
    const connection = new RelayConnection(socket, this.sessionId);

    connection.on("message", (message, raw) => {
      this.logger.message(this.sessionId, message, raw);
      this.handleMessage(message);
    });

    connection.on("error", (event) => {
      this.handleConnectionError(event);
    });

    connection.on("close", (event) => {
      this.handleConnectionClose(event);
    });

    return connection;
  }

  /**
   * Route one message. Throwing here (type mismatch) is fatal to the
   * connection: the connection reports it and closes.
   */
  private handleMessage(message: RelayMessage): void {
    if (!this.receivedData) {
      this.receivedData = true;
      this.logger.session(this.sessionId, "Relay accepted init");
    }
    this.metrics.messageProcessed(message.isPush());

    if (message.isPush()) {
      this.handlePush(message);
    } else {
      this.handleResponse(message);
    }

    this.emit("message", message);
  }

  private handlePush(message: RelayMessage): void {
    switch (message.id) {
      case "_pong":
        this.settle(message.expect("str") ?? "", message);
        return;

      case "_upgrade":
        // Relay is upgrading: stop updates until it is back
        this.logger.session(this.sessionId, "Relay upgrading");
        this.send(desyncCommand());
        return;

      case "_upgrade_ended":
        this.logger.session(this.sessionId, "Relay upgrade ended, resyncing");
        this.mirror.reset();
        this.sendSync();
        return;

      default:
        this.mirror.apply(message);
    }
  }

  private handleResponse(message: RelayMessage): void {
    if (!this.settle(message.id, message)) {
      this.logger.debug(`[${this.sessionId}] Unsolicited response "${message.id}"`);
    }
  }

  /**
   * Complete the request a message answers
   *
   * @returns false if nothing was waiting for this id
   */
  private settle(id: string, message: RelayMessage): boolean {
    const pending = this.requests.take(id);
    if (!pending) return false;

    let response: Response;
    try {
      response = this.interpret(pending.semantics, message);
    } catch (err) {
      pending.reject?.(err instanceof Error ? err : new Error(String(err)));
      throw err;
    }
    pending.resolve?.(response);
    return true;
  }

  private interpret(semantics: ResponseSemantics, message: RelayMessage): Response {
    switch (semantics.kind) {
      case "mirror":
        return { message, events: this.mirror.apply(message, semantics.update) };
      case "info":
        message.expect("inf");
        return { message, events: [] };
      case "hdata":
        message.expectHData();
        return { message, events: [] };
      case "pong":
        return { message, events: [] };
    }
  }

  /**
   * Initial requests: buffers, recent lines, nicklists, then subscribe
   */
  private sendSync(): void {
    const lines = this.options?.lines ?? 0;

    this.send(
      hdataCommand(
        "buffer:gui_buffers(*)",
        BUFFER_KEYS,
        this.requests.expect({ kind: "mirror", update: "buffers" }, "buffers")
      )
    );
    if (lines > 0) {
      this.send(
        hdataCommand(
          `buffer:gui_buffers(*)/own_lines/last_line(-${lines})/data`,
          LINE_KEYS,
          this.requests.expect({ kind: "mirror", update: "lines" }, "lines")
        )
      );
    }
    this.send(
      nicklistCommand(undefined, this.requests.expect({ kind: "mirror", update: "nicklist" }, "nicklist"))
    );
    this.send(syncCommand());
  }

  /**
   * Send a tracked request and wait for its response
   */
  private async request(
    semantics: ResponseSemantics,
    build: (id: string) => Command,
    prefix?: string
  ): Promise<Response> {
    this.ensureWritable();
    const { id, response } = this.requests.request(semantics, prefix);
    try {
      this.send(build(id));
    } catch (err) {
      this.requests.cancel(id, err instanceof Error ? err : new Error(String(err)));
    }
    return response;
  }

  private send(command: Command): void {
    if (!this.connection || !this.connection.send(command)) {
      throw new ConnectionError("Not connected", { code: "ENOTCONN" });
    }
    this.metrics.commandSent();
    this.logger.command(this.sessionId, command);
  }

  private ensureWritable(): void {
    if (!WRITABLE_STATES.includes(this.state)) {
      throw new ConnectionError(`Not connected (${this.state})`, { code: "ENOTCONN" });
    }
  }

  private handleConnectionError(event: ConnectionErrorEvent): void {
    if (this.fatalError) return;

    const type: SessionErrorType = event.type === "transport" ? "connection" : event.type;
    const error =
      type === "connection" && !(event.error instanceof ConnectionError)
        ? new ConnectionError(event.reason, { cause: event.error })
        : event.error;

    this.report({ type, reason: event.reason, fatal: true, error });
    if (this.state !== SessionState.CLOSING) {
      this.transition(SessionState.CLOSING, event.reason);
    }
  }

  private handleConnectionClose(event: ConnectionCloseEvent): void {
    if (!this.fatalError && !this.disconnectRequested) {
      const reason = event.silent
        ? "Relay closed the connection without sending data (wrong password or one-time password?)"
        : "Connection closed by relay";
      this.report({
        type: "connection",
        reason,
        fatal: true,
        error: new ConnectionError(reason, { code: "ECONNRESET" }),
      });
    }

    if (this.state !== SessionState.CLOSING) {
      this.transition(SessionState.CLOSING, "transport closed");
    }

    // Cleanup
    const failure = this.fatalError;
    const reason = failure?.reason ?? "Disconnected";
    this.requests.rejectAll(
      failure?.error ?? new ConnectionError("Disconnected", { code: "ECONNABORTED" })
    );
    this.connection = null;
    this.metrics.disconnected(event.bytesSent, event.bytesReceived);
    if (this.options?.onDisconnect !== "retain") {
      this.mirror.reset();
    }

    this.transition(SessionState.DISCONNECTED, reason);
    this.logger.session(this.sessionId, "Disconnected", {
      reason,
      sent: `${event.bytesSent}B`,
      received: `${event.bytesReceived}B`,
    });
    this.emit("disconnected", failure ? { reason, error: failure } : { reason });
  }

  private finishConnectFailure(error: ConnectionError): void {
    this.report({ type: "connection", reason: error.message, fatal: true, error });
    this.transition(SessionState.DISCONNECTED, error.message);
    this.emit("disconnected", { reason: error.message, error: this.fatalError ?? undefined });
  }

  /**
   * Record and surface the one fatal error of this connection
   */
  private report(event: SessionErrorEvent): void {
    this.fatalError = event;
    this.metrics.fatalError();
    this.logger.error(`[${this.sessionId}] ${event.reason}`, { type: event.type });
    if (this.listenerCount("error") > 0) {
      this.emit("error", event);
    }
  }

  /**
   * Transition to a new state
   */
  private transition(next: SessionState, reason?: string): void {
    if (this.state === next) return;

    const allowed = this.isTransitionAllowed(this.state, next);
    if (!allowed) {
      throw new Error(`Invalid state transition: ${this.state} → ${next}`);
    }

    const previous = this.state;
    this.state = next;
    this.logger.stateTransition(this.sessionId, previous, next, reason);
    this.emit("state", next, previous);
  }

  /**
   * Check if a state transition is valid
   */
  private isTransitionAllowed(from: SessionState, to: SessionState): boolean {
    const transitions: Record<SessionState, SessionState[]> = {
      [SessionState.DISCONNECTED]: [SessionState.CONNECTING],
      [SessionState.CONNECTING]: [SessionState.HANDSHAKING, SessionState.DISCONNECTED],
      [SessionState.HANDSHAKING]: [SessionState.AUTHENTICATED, SessionState.CLOSING],
      [SessionState.AUTHENTICATED]: [SessionState.ACTIVE, SessionState.CLOSING],
      [SessionState.ACTIVE]: [SessionState.CLOSING],
      [SessionState.CLOSING]: [SessionState.DISCONNECTED],
    };

    return transitions[from]?.includes(to) ?? false;
  }
}
