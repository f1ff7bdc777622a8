/**
 * Client configuration
 *
 * Process-wide defaults come from the environment; per-connection options are
 * supplied to connect() and validated here.
 */

import { z } from "zod";

export const config = {
  debug: process.env.WEERELAY_DEBUG === "1",
  port: parseInt(process.env.WEERELAY_PORT || "9000", 10),
  lines: parseInt(process.env.WEERELAY_LINES || "50", 10),
  connectTimeout: parseInt(process.env.WEERELAY_CONNECT_TIMEOUT || "30000", 10),
};

export const connectOptionsSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(config.port),
  password: z.string().refine((value) => !/[,\r\n]/.test(value), {
    message: "Password must not contain commas or line breaks",
  }),
  tls: z.boolean().default(false),
  /** Verify the relay certificate when tls is on */
  verifyCertificate: z.boolean().default(true),
  totp: z
    .string()
    .regex(/^[0-9]{6,10}$/, "One-time password must be 6 to 10 digits")
    .optional(),
  compression: z.enum(["zlib", "off"]).default("zlib"),
  /** Lines fetched per buffer when syncing */
  lines: z.number().int().min(0).default(config.lines),
  /** What the mirror keeps once the session is disconnected */
  onDisconnect: z.enum(["reset", "retain"]).default("reset"),
  connectTimeout: z.number().int().positive().default(config.connectTimeout),
});

export type ConnectOptionsInput = z.input<typeof connectOptionsSchema>;
export type ConnectOptions = z.output<typeof connectOptionsSchema>;

export function parseConnectOptions(input: ConnectOptionsInput): ConnectOptions {
  return connectOptionsSchema.parse(input);
}
