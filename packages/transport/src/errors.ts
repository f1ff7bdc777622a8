/**
 * Transport Error Classes
 */

export class ConnectionError extends Error {
  public readonly code?: string;

  constructor(message: string, options?: { code?: string; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "ConnectionError";
    this.code = options?.code;
  }
}
