export type TelescopeErrorKind =
  | 'HandshakeTimeout'
  | 'ConnectionRefused'
  | 'ConnectionLost'
  | 'NotConnected'
  | 'RequestTimeout'
  | 'RemoteError'
  | 'DecodeError'
  | 'NotFound'
  | 'CatalogUnavailable'
  | 'BelowHorizon'
  | 'SolarSafety'
  | 'LocationNotConfigured'
  | 'InvalidInput'
  | 'OperationFailed'
  | 'Unsupported';

/**
 * Base class for every failure surfaced by the bridge. `context` carries what
 * a caller needs to decide on a manual retry (target, method, last state...).
 */
export abstract class TelescopeError extends Error {
  abstract readonly kind: TelescopeErrorKind;

  constructor(
    message: string,
    readonly context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = new.target.name;
  }

  toJSON(): { kind: TelescopeErrorKind; message: string; context: Record<string, unknown> } {
    return { kind: this.kind, message: this.message, context: this.context };
  }
}

export class HandshakeTimeoutError extends TelescopeError {
  readonly kind = 'HandshakeTimeout' as const;

  constructor(host: string, port: number, timeoutMs: number) {
    super(`No UDP handshake reply from ${host}:${port} within ${timeoutMs}ms`, {
      host,
      port,
      timeoutMs,
    });
  }
}

export class ConnectionRefusedError extends TelescopeError {
  readonly kind = 'ConnectionRefused' as const;

  constructor(host: string, port: number, cause?: string) {
    super(`TCP connection to ${host}:${port} failed${cause ? `: ${cause}` : ''}`, {
      host,
      port,
      cause,
    });
  }
}

export class ConnectionLostError extends TelescopeError {
  readonly kind = 'ConnectionLost' as const;

  constructor(reason: string, context: Record<string, unknown> = {}) {
    super(`Connection to telescope lost: ${reason}`, { reason, ...context });
  }
}

export class NotConnectedError extends TelescopeError {
  readonly kind = 'NotConnected' as const;

  constructor(state: string, method?: string) {
    super(`Telescope is not connected (state: ${state})`, { state, method });
  }
}

export class RequestTimeoutError extends TelescopeError {
  readonly kind = 'RequestTimeout' as const;

  constructor(method: string, id: number, timeoutMs: number) {
    super(`Request ${method} (id ${id}) timed out after ${timeoutMs}ms`, {
      method,
      id,
      timeoutMs,
    });
  }
}

export class RemoteError extends TelescopeError {
  readonly kind = 'RemoteError' as const;

  constructor(
    readonly code: number,
    readonly remoteMessage: string,
    method: string,
    id: number
  ) {
    super(`Telescope rejected ${method} (code ${code}): ${remoteMessage}`, {
      code,
      method,
      id,
    });
  }
}

export class DecodeError extends TelescopeError {
  readonly kind = 'DecodeError' as const;

  constructor(line: string, reason: string) {
    super(`Malformed frame: ${reason}`, { line: line.slice(0, 200), reason });
  }
}

export class TargetNotFoundError extends TelescopeError {
  readonly kind = 'NotFound' as const;

  constructor(
    readonly targetName: string,
    readonly alternatives: string[]
  ) {
    super(
      `Target '${targetName}' not found.${alternatives.length > 0 ? ` Try: ${alternatives.join(', ')}` : ''}`,
      { targetName, alternatives }
    );
  }
}

export class CatalogUnavailableError extends TelescopeError {
  readonly kind = 'CatalogUnavailable' as const;

  constructor(catalog: string, reason: string) {
    super(`Catalog ${catalog} unavailable: ${reason}`, { catalog, reason });
  }
}

export class BelowHorizonError extends TelescopeError {
  readonly kind = 'BelowHorizon' as const;

  constructor(targetName: string, altitudeDegrees: number, minimumAltitudeDegrees: number) {
    super(
      `Target '${targetName}' is below the horizon (altitude ${altitudeDegrees.toFixed(1)}°, minimum ${minimumAltitudeDegrees}°)`,
      { targetName, altitudeDegrees, minimumAltitudeDegrees }
    );
  }
}

export class SolarSafetyError extends TelescopeError {
  readonly kind = 'SolarSafety' as const;

  constructor(targetName: string) {
    super(
      `Pointing at '${targetName}' requires explicit acknowledgement that a solar filter is installed`,
      { targetName }
    );
  }
}

export class LocationNotConfiguredError extends TelescopeError {
  readonly kind = 'LocationNotConfigured' as const;

  constructor() {
    super('Observer location is not configured');
  }
}

export class InvalidInputError extends TelescopeError {
  readonly kind = 'InvalidInput' as const;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, context);
  }
}

/**
 * The telescope accepted a command but reported failure through its event
 * stream (e.g. an AutoGoto "fail").
 */
export class OperationFailedError extends TelescopeError {
  readonly kind = 'OperationFailed' as const;

  constructor(operation: string, reason: string, context: Record<string, unknown> = {}) {
    super(`${operation} failed: ${reason}`, { operation, reason, ...context });
  }
}

export class UnsupportedOperationError extends TelescopeError {
  readonly kind = 'Unsupported' as const;

  constructor(operation: string, message: string) {
    super(message, { operation });
  }
}

export function isTelescopeError(error: unknown): error is TelescopeError {
  return error instanceof TelescopeError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
