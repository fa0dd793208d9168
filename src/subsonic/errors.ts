/**
 * Failures talking to a Subsonic-compatible server.
 *
 * Transport and decode failures are recovered where the call is made
 * (a listing page, a single album detail); SubsonicApiError carries the
 * server-reported code so callers can tell "wrong credentials" from
 * "album not found".
 */
export class SubsonicError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SubsonicError';
  }
}

export class SubsonicTransportError extends SubsonicError {
  constructor(
    readonly endpoint: string,
    message: string,
    readonly statusCode?: number,
    options?: ErrorOptions
  ) {
    super(`${endpoint}: ${message}`, options);
    this.name = 'SubsonicTransportError';
  }
}

export class SubsonicDecodeError extends SubsonicError {
  constructor(readonly endpoint: string, message: string, options?: ErrorOptions) {
    super(`${endpoint}: ${message}`, options);
    this.name = 'SubsonicDecodeError';
  }
}

export class SubsonicApiError extends SubsonicError {
  constructor(readonly endpoint: string, readonly code: number, readonly detail: string) {
    super(`${endpoint}: Navidrome API error ${code}: ${detail}`);
    this.name = 'SubsonicApiError';
  }
}
