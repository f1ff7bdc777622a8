/**
 * Outbound Commands
 *
 * The client speaks plain text to the relay: one command per line,
 * optionally prefixed with "(id) " so the response carries that id back.
 */

export type CompressionPreference = "zlib" | "off";

export type InitOptions = {
  password: string;
  compression?: CompressionPreference;
  totp?: string;
};

export type Command = {
  id?: string;
  name: string;
  args?: string;
};

// Separators inside init options and of commands themselves
const INIT_FORBIDDEN = /[,\r\n]/;
const LINE_FORBIDDEN = /[\r\n]/;

function assertSingleLine(value: string, what: string): void {
  if (LINE_FORBIDDEN.test(value)) {
    throw new Error(`${what} must not contain line breaks`);
  }
}

/**
 * Format a command as one newline-terminated line
 */
export function formatCommand(command: Command): string {
  const prefix = command.id ? `(${command.id}) ` : "";
  const args = command.args ? ` ${command.args}` : "";
  const line = `${prefix}${command.name}${args}`;
  assertSingleLine(line, `Command "${command.name}"`);
  return `${line}\n`;
}

export function initCommand(options: InitOptions): Command {
  const fields = [`password=${options.password}`];
  if (options.compression) {
    fields.push(`compression=${options.compression}`);
  }
  if (options.totp) {
    fields.push(`totp=${options.totp}`);
  }
  for (const field of fields) {
    if (INIT_FORBIDDEN.test(field)) {
      throw new Error(`init option "${field.split("=")[0]}" must not contain "," or line breaks`);
    }
  }
  return { name: "init", args: fields.join(",") };
}

export function hdataCommand(path: string, keys?: readonly string[], id?: string): Command {
  const args = keys && keys.length > 0 ? `${path} ${keys.join(",")}` : path;
  return { id, name: "hdata", args };
}

export function infoCommand(name: string, id?: string): Command {
  return { id, name: "info", args: name };
}

export function nicklistCommand(buffer?: string, id?: string): Command {
  return { id, name: "nicklist", args: buffer };
}

export function inputCommand(buffer: string, text: string, id?: string): Command {
  assertSingleLine(text, "Input text");
  return { id, name: "input", args: `${buffer} ${text}` };
}

export function syncCommand(buffers?: readonly string[], id?: string): Command {
  return { id, name: "sync", args: buffers && buffers.length > 0 ? buffers.join(",") : undefined };
}

export function desyncCommand(buffers?: readonly string[], id?: string): Command {
  return { id, name: "desync", args: buffers && buffers.length > 0 ? buffers.join(",") : undefined };
}

export function pingCommand(data?: string, id?: string): Command {
  return { id, name: "ping", args: data };
}

export function quitCommand(): Command {
  return { name: "quit" };
}
