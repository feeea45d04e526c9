/**
 * Error types raised inside the advisory pipeline
 */

export type PeerErrorCode =
  | 'TIMEOUT'
  | 'NETWORK_ERROR'
  | 'HTTP_ERROR'
  | 'EMPTY_BODY'
  | 'INVALID_JSON';

/**
 * Invalid configuration value detected at construction time
 */
export class ConfigurationError extends Error {
  readonly setting: string;

  constructor(setting: string, message: string) {
    super(`Invalid configuration for ${setting}: ${message}`);
    this.name = 'ConfigurationError';
    this.setting = setting;
  }
}

/**
 * Failure of a single peer request; converted into an acquisition outcome
 * before it reaches callers of the acquirer
 */
export class PeerRequestError extends Error {
  readonly code: PeerErrorCode;
  readonly status?: number;

  constructor(code: PeerErrorCode, message: string, status?: number) {
    super(message);
    this.name = 'PeerRequestError';
    this.code = code;
    this.status = status;
  }
}

/**
 * Extract a readable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {return error.message;}
  return String(error);
}
