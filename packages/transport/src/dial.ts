import { connect as connectTcp, type Socket } from "net";
import { connect as connectTls } from "tls";
import type { Duplex } from "stream";
import { ConnectionError } from "./errors.js";

export type DialOptions = {
  host: string;
  port: number;
  tls: boolean;
  /** Verify the relay's certificate (TLS only) */
  rejectUnauthorized?: boolean;
  /** Give up if the transport is not ready within this many ms */
  timeoutMs?: number;
};

/**
 * Opens the byte stream to a relay.
 *
 * Injectable so sessions can run over any Duplex (tests use an in-process one).
 */
export type Dialer = (options: DialOptions) => Promise<Duplex>;

/**
 * Open a TCP (optionally TLS-wrapped) connection to a relay
 *
 * Resolves once the transport is ready for writing: after the TCP connect,
 * or after the TLS handshake.
 */
export const dial: Dialer = (options) => {
  return new Promise((resolve, reject) => {
    const socket: Socket = options.tls
      ? connectTls({
          host: options.host,
          port: options.port,
          servername: options.host,
          rejectUnauthorized: options.rejectUnauthorized ?? true,
        })
      : connectTcp(options.port, options.host);

    const readyEvent = options.tls ? "secureConnect" : "connect";
    let timer: NodeJS.Timeout | undefined;

    const cleanup = () => {
      if (timer) clearTimeout(timer);
      socket.off(readyEvent, onReady);
      socket.off("error", onError);
    };

    const onReady = () => {
      cleanup();
      resolve(socket);
    };

    const onError = (err: NodeJS.ErrnoException) => {
      cleanup();
      socket.destroy();
      reject(
        new ConnectionError(
          `Failed to connect to ${options.host}:${options.port}: ${err.message}`,
          { code: err.code, cause: err }
        )
      );
    };

    if (options.timeoutMs !== undefined) {
      timer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(
          new ConnectionError(
            `Timed out connecting to ${options.host}:${options.port} after ${options.timeoutMs}ms`,
            { code: "ETIMEDOUT" }
          )
        );
      }, options.timeoutMs);
    }

    socket.once(readyEvent, onReady);
    socket.once("error", onError);
  });
};
