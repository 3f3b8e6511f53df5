// Transcript Relay - Error taxonomy
//
// Upstream transport failures are caught at the pump boundary and turned into
// client notifications; only AuthError ends a session on its own.

export class RelayError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** No upstream credential configured. Fatal for the session, never retried. */
export class AuthError extends RelayError {
  constructor(message = "Upstream transcription credential is not configured") {
    super("missing_upstream_credential", message);
  }
}

export class ConnectError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("upstream_connect_error", message, options);
  }
}

export class SendError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("upstream_send_error", message, options);
  }
}

export class ReceiveError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("upstream_recv_error", message, options);
  }
}

/** Malformed upstream payload. Dropped by the connection, never surfaced. */
export class DecodeError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("decode_error", message, options);
  }
}

export class ConfigError extends RelayError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super("config_error", `Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/** Renders an unknown thrown value as `Name: message` for logs and client `detail` fields. */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return `${err.name}: ${err.message}`;
  }
  return String(err);
}
