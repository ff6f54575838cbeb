export type ScpErrorKind = "session" | "protocol" | "io" | "canceled" | "walk" | "remote";

export class ScpError extends Error {
  constructor(
    message: string,
    readonly kind: ScpErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ScpError";
  }
}

export class SessionError extends ScpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "session", options);
    this.name = "SessionError";
  }
}

export class ProtocolViolationError extends ScpError {
  constructor(
    message: string,
    readonly raw: string
  ) {
    super(message, "protocol");
    this.name = "ProtocolViolationError";
  }

  static unparseable(raw: string): ProtocolViolationError {
    return new ProtocolViolationError(`Could not parse protocol message: ${raw}`, raw);
  }

  static unexpected(raw: string): ProtocolViolationError {
    return new ProtocolViolationError(`Unexpected protocol message: ${JSON.stringify(raw)}`, raw);
  }

  static unsafeName(name: string, raw: string): ProtocolViolationError {
    return new ProtocolViolationError(`Unsafe entry name: ${JSON.stringify(name)}`, raw);
  }
}

export class TransferIoError extends ScpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "io", options);
    this.name = "TransferIoError";
  }
}

export class TransferCanceledError extends ScpError {
  constructor() {
    super("Transfer canceled.", "canceled");
    this.name = "TransferCanceledError";
  }
}

export class FilesystemWalkError extends ScpError {
  constructor(
    readonly path: string,
    cause: Error
  ) {
    super(`Cannot read ${path}: ${cause.message}`, "walk", { cause });
    this.name = "FilesystemWalkError";
  }
}

export class RemotePeerError extends ScpError {
  constructor(
    readonly severity: "warning" | "error",
    readonly text: string
  ) {
    super(
      severity === "warning" ? `Warning message: ${JSON.stringify(text)}` : `Error message: ${JSON.stringify(text)}`,
      "remote"
    );
    this.name = "RemotePeerError";
  }
}

export function toScpError(error: unknown): ScpError {
  if (error instanceof ScpError) {
    return error;
  }
  if (error instanceof Error) {
    return new TransferIoError(error.message, { cause: error });
  }
  return new TransferIoError(String(error));
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
