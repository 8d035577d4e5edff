export type WorkerErrorKind = "configuration" | "connection" | "rpc" | "state";

export class WorkerError extends Error {
  readonly kind: WorkerErrorKind;
  readonly code: string;

  constructor(kind: WorkerErrorKind, code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.code = code;
  }
}

/** Bad static configuration. Raised before any network I/O. */
export class ConfigurationError extends WorkerError {
  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super("configuration", code, message, options);
  }
}

export class ConnectionError extends WorkerError {
  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super("connection", code, message, options);
  }
}

export class RpcError extends WorkerError {
  readonly status: number;
  readonly body: string;

  constructor(
    code: string,
    message: string,
    details: { status: number; body?: string },
    options?: { cause?: unknown }
  ) {
    super("rpc", code, message, options);
    this.status = details.status;
    this.body = details.body ?? "";
  }
}

export class StateError extends WorkerError {
  constructor(code: string, message: string) {
    super("state", code, message);
  }
}

export function isWorkerError(err: unknown): err is WorkerError {
  return err instanceof WorkerError;
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    const json = JSON.stringify(err);
    return json === undefined ? String(err) : json;
  } catch {
    return String(err);
  }
}
