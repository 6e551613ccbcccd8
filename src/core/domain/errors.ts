export type CaseBridgeErrorCode =
  | 'ACCOUNT_NOT_FOUND'
  | 'EXCHANGE_FAILED'
  | 'ALREADY_EXISTS'
  | 'TIMEOUT'
  | 'BACKEND_FAILED';

export class CaseBridgeError extends Error {
  constructor(
    readonly code: CaseBridgeErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class AccountNotFoundError extends CaseBridgeError {
  constructor(readonly accountKey: string) {
    super('ACCOUNT_NOT_FOUND', `Account "${accountKey}" is not configured`);
  }
}

export class ExchangeFailedError extends CaseBridgeError {
  constructor(readonly accountKey: string, cause: unknown) {
    super('EXCHANGE_FAILED', `Credential exchange failed for account "${accountKey}": ${describeError(cause)}`, {
      cause,
    });
  }
}

export class AlreadyExistsError extends CaseBridgeError {
  constructor(
    readonly accountKey: string,
    readonly caseId: string,
    readonly existingConversationId: string,
  ) {
    super(
      'ALREADY_EXISTS',
      `Case ${caseId} on account "${accountKey}" is already linked to conversation ${existingConversationId}`,
    );
  }
}

export class OperationTimeoutError extends CaseBridgeError {
  constructor(readonly operation: string, readonly timeoutMs: number) {
    super('TIMEOUT', `${operation} timed out after ${timeoutMs}ms`);
  }
}

export class BackendError extends CaseBridgeError {
  constructor(
    message: string,
    readonly unauthorized: boolean,
    cause?: unknown,
  ) {
    super('BACKEND_FAILED', message, { cause });
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return 'Unknown error';
}
