import type { AlertIdentity } from './types.js';

export class InvalidModeError extends Error {
  readonly mode: string;

  constructor(mode: string) {
    super(`Unknown scheduling mode "${mode}" (expected own, competitor or both)`);
    this.name = 'InvalidModeError';
    this.mode = mode;
  }
}

export class StoreUnavailableError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Store operation ${operation} failed: ${reason}`, { cause });
    this.name = 'StoreUnavailableError';
    this.operation = operation;
  }
}

/** Thrown by the store when an alert with the same identity landed inside the dedup window first. */
export class DuplicateAlertError extends Error {
  readonly identity: AlertIdentity;

  constructor(identity: AlertIdentity) {
    super(`Alert ${identity.kind} already open for ${identity.productGroupKey}/${identity.channel}`);
    this.name = 'DuplicateAlertError';
    this.identity = identity;
  }
}

export class UnsupportedChannelError extends Error {
  readonly channel: string;

  constructor(channel: string) {
    super(`Unsupported channel: ${channel}`);
    this.name = 'UnsupportedChannelError';
    this.channel = channel;
  }
}

export class FetchError extends Error {
  readonly endpointRef: string;

  constructor(endpointRef: string, message: string, cause?: unknown) {
    super(`Failed to fetch ${endpointRef}: ${message}`, cause === undefined ? undefined : { cause });
    this.name = 'FetchError';
    this.endpointRef = endpointRef;
  }
}
