/**
 * Typed failures raised across the relay. Handlers branch on these classes,
 * so every layer throws one of them rather than a bare Error where the
 * caller is expected to react.
 */

export type TransportErrorKind = 'forbidden' | 'bad_request' | 'unknown';

/** Storage stayed unreachable after every retry attempt */
export class StorageUnavailableError extends Error {
  constructor(
    readonly operation: string,
    readonly attempts: number,
    cause?: unknown,
  ) {
    super(`Storage unavailable during ${operation} after ${attempts} attempts`, { cause });
    this.name = 'StorageUnavailableError';
  }
}

/** Input rejected before it reached storage (e.g. a malformed phone number) */
export class InvalidFormatError extends Error {
  constructor(
    readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'InvalidFormatError';
  }
}

/** A messaging-platform call failed */
export class TransportError extends Error {
  constructor(
    readonly kind: TransportErrorKind,
    readonly method: string,
    readonly description: string,
    readonly statusCode?: number,
  ) {
    super(`${method} failed (${kind}): ${description}`);
    this.name = 'TransportError';
  }

  /** Staff tried to message another bot */
  get isBotTarget(): boolean {
    return this.kind === 'forbidden' && this.description.includes("bots can't send messages to bots");
  }

  /** The bot lacks the "Manage topics" permission in the staff group */
  get isTopicRightsMissing(): boolean {
    return this.kind === 'bad_request' && this.description.includes('not enough rights to create a topic');
  }
}

/** A ticket could not be bound to, or found for, a discussion thread */
export class RoutingError extends Error {
  constructor(
    readonly ticketId: number | null,
    message: string,
  ) {
    super(message);
    this.name = 'RoutingError';
  }
}
