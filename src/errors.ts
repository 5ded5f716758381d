/**
 * Base class for every failure a store operation can report. Subclasses form a
 * closed set; `kind` lets callers switch over them exhaustively.
 */
export abstract class EslStoreError extends Error {
  abstract readonly kind: EslStoreErrorKind;

  constructor(
    message: string,
    cause?: unknown,
    public readonly suggestion?: string,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/** The server root URL cannot be parsed */
export class UrlError extends EslStoreError {
  readonly kind = "url";

  constructor(public readonly url: string, cause?: unknown) {
    super(
      `Invalid server URL "${url}"`,
      cause,
      "Set an absolute http(s) URL as the Parse server root",
    );
  }
}

/** The request never got a response: refused, DNS, timeout or reset */
export class TransportError extends EslStoreError {
  readonly kind = "transport";
}

/** A payload could not be encoded, or a response did not decode */
export class SerializationError extends EslStoreError {
  readonly kind = "serialization";
}

export class IoError extends EslStoreError {
  readonly kind = "io";
}

/**
 * The object store answered with an unexpected status. `cause` is the
 * server's `error` message verbatim.
 */
export class PlatformError extends EslStoreError {
  readonly kind = "platform";

  constructor(
    public readonly status: number,
    public readonly cause: string,
    public readonly code?: number,
  ) {
    super(`Parse request failed. status: ${status}, cause: ${cause}`);
  }
}

export class DatabaseError extends EslStoreError {
  readonly kind = "database";

  constructor(
    message: string,
    cause?: unknown,
    /** SQLSTATE reported by the server, when there is one */
    public readonly code?: string,
  ) {
    super(message, cause);
  }
}

export class MissingIdentityError extends EslStoreError {
  readonly kind = "missing-identity";

  constructor() {
    super(
      "This ESL has no identity, save it first",
      undefined,
      "Only records returned by save() can be updated",
    );
  }
}

/** The record was rejected before anything was written */
export class ValidationError extends EslStoreError {
  readonly kind = "validation";
}

export type EslStoreErrorKind =
  | "url"
  | "transport"
  | "serialization"
  | "io"
  | "platform"
  | "database"
  | "missing-identity"
  | "validation";

export function isEslStoreError(err: unknown): err is EslStoreError {
  return err instanceof EslStoreError;
}

// ============ Startup errors ============
// Not part of the store taxonomy: these come from wiring the process together.

export class ConfigError extends Error {
  constructor(
    message: string,
    cause?: unknown,
    public readonly suggestion?: string,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "ConfigError";
  }
}

/** No pooled connection became available within the pool's timeout */
export class ConnectionAcquireError extends Error {
  constructor(
    public readonly identifier: string,
    cause?: unknown,
  ) {
    super(`Could not acquire a database connection for ${identifier}`, { cause });
    this.name = "ConnectionAcquireError";
  }

  get suggestion(): string {
    return "Check that the database is reachable and that the pool is large enough";
  }
}
