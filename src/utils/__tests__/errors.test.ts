import { describe, it, expect } from 'vitest';
import {
  BotError,
  ConfigurationError,
  InterpretationError,
  TransactionNotFoundError,
  errorMessage
} from '../errors.js';

describe('errors', () => {
  it('names the missing transaction', () => {
    const error = new TransactionNotFoundError('abc-123');
    expect(error).toBeInstanceOf(BotError);
    expect(error.name).toBe('TransactionNotFoundError');
    expect(error.message).toBe('No live transaction found for transaction_id: abc-123');
  });

  it('keeps subclass names', () => {
    expect(new ConfigurationError('x').name).toBe('ConfigurationError');
    expect(new InterpretationError('x')).toBeInstanceOf(BotError);
  });

  it('extracts a message from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(404)).toBe('404');
  });
});
