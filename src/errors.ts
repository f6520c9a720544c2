export class DailyLogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends DailyLogError {}

export class TimeWindowError extends DailyLogError {}

export interface HttpFailure {
  status: number;
  statusText: string;
  body: string;
}

/**
 * Raised by the network steps. `http` is set when the remote service answered
 * with a non-2xx status; transport and parsing failures leave it undefined.
 */
export class RemoteCallError extends DailyLogError {
  readonly http?: HttpFailure;

  constructor(message: string, http?: HttpFailure) {
    super(message);
    this.http = http;
  }
}

export class TokenError extends RemoteCallError {}

export class SubmitError extends RemoteCallError {}
