/**
 * Bot Domain Errors
 *
 * Error classes raised by the services and caught by the message handlers.
 */

export class BotError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BotError';
  }
}

export class ConfigurationError extends BotError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class TransactionNotFoundError extends BotError {
  constructor(transactionId: string) {
    super(`No live transaction found for transaction_id: ${transactionId}`);
    this.name = 'TransactionNotFoundError';
  }
}

export class InterpretationError extends BotError {
  constructor(message: string) {
    super(message);
    this.name = 'InterpretationError';
  }
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
