/**
 * Protocol Error Classes
 *
 * IncompleteFrameError is recoverable (wait for more bytes). The others are
 * fatal to the connection that produced them.
 */

export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

export class IncompleteFrameError extends ProtocolError {
  public readonly needed: number;
  public readonly available: number;

  constructor(needed: number, available: number) {
    super(`Incomplete data: need ${needed} bytes, ${available} available`);
    this.name = "IncompleteFrameError";
    this.needed = needed;
    this.available = available;
  }
}

export class MalformedFrameError extends ProtocolError {
  constructor(message: string) {
    super(message);
    this.name = "MalformedFrameError";
  }
}

export class TypeMismatchError extends ProtocolError {
  public readonly expected: string;
  public readonly actual: string;

  constructor(expected: string, actual: string, context?: string) {
    super(
      `Type mismatch${context ? ` in ${context}` : ""}: expected ${expected}, got ${actual}`
    );
    this.name = "TypeMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}
