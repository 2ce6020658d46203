import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { InterpretationError } from '../../utils/errors.js';
import type { TransactionExtraction } from '../../types/index.js';
import {
  describeTransaction,
  interpretInventory,
  interpretTransaction,
  summarizeTransaction
} from '../openaiService.js';

const openai = vi.hoisted(() => ({
  parse: vi.fn(),
  clientOptions: new Array<unknown>()
}));

vi.mock('openai', () => ({
  default: class {
    beta = { chat: { completions: { parse: openai.parse } } };

    constructor(options: unknown) {
      openai.clientOptions.push(options);
    }
  }
}));

function completion(parsed: unknown) {
  return { choices: [{ message: { parsed } }] };
}

const extraction: TransactionExtraction = {
  total_sale_price: 30,
  payment_method: 'cash',
  sales: [
    { item: 'rosa', quality: 'premium', quantity: 12, unit_price: 2.5 },
    { item: 'girasol', quality: null, quantity: null, unit_price: null }
  ],
  expenses: [{ description: 'bolsas', amount: 1.5 }]
};

const DESCRIPTION = [
  '🌸 Ventas:',
  '- 12 x rosa (premium) a $2.50 c/u',
  '- ? x girasol',
  'Total: $30.00 (efectivo)',
  '💸 Gastos:',
  '- bolsas: $1.50'
].join('\n');

describe('openaiService', () => {
  beforeEach(() => {
    openai.parse.mockReset();
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('interpretTransaction', () => {
    it('requests a structured extraction from the default model', async () => {
      openai.parse.mockResolvedValueOnce(completion(extraction));

      await expect(interpretTransaction('vendimos una docena de rosas premium')).resolves.toEqual(extraction);

      expect(openai.clientOptions).toContainEqual({ apiKey: 'test-openai-key' });
      const [request] = openai.parse.mock.calls[0];
      expect(request.model).toBe('gpt-4o-mini');
      expect(request.temperature).toBe(0.2);
      expect(request.messages[1]).toEqual({ role: 'user', content: 'vendimos una docena de rosas premium' });
      expect(request.response_format.type).toBe('json_schema');
      expect(request.response_format.json_schema.name).toBe('transaction_extraction');
    });

    it('uses the model from the bot config', async () => {
      openai.parse.mockResolvedValueOnce(completion(extraction));

      await interpretTransaction('vendimos rosas', { model: 'gpt-4.1-mini' });

      expect(openai.parse.mock.calls[0][0].model).toBe('gpt-4.1-mini');
    });

    it('retries once on the fallback model', async () => {
      openai.parse
        .mockRejectedValueOnce(new Error('rate limited'))
        .mockResolvedValueOnce(completion(extraction));

      await expect(interpretTransaction('vendimos rosas')).resolves.toEqual(extraction);

      expect(openai.parse).toHaveBeenCalledTimes(2);
      expect(openai.parse.mock.calls[1][0].model).toBe('gpt-4o');
    });

    it('does not retry when the fallback model already failed', async () => {
      openai.parse.mockRejectedValueOnce(new Error('rate limited'));

      await expect(interpretTransaction('vendimos rosas', { model: 'gpt-4o' })).rejects.toThrow('rate limited');
      expect(openai.parse).toHaveBeenCalledTimes(1);
    });

    it('fails when neither model returns parsed content', async () => {
      openai.parse.mockResolvedValue(completion(null));

      const result = interpretTransaction('???');

      await expect(result).rejects.toBeInstanceOf(InterpretationError);
      await expect(result).rejects.toThrow('Failed to parse transaction_extraction response from gpt-4o');
    });
  });

  it('extracts inventory lines', async () => {
    const inventory = { inventory: [{ item: 'rosa', quality: 'regular', quantity: 24 }] };
    openai.parse.mockResolvedValueOnce(completion(inventory));

    await expect(interpretInventory('2 docenas de rosas')).resolves.toEqual(inventory);
    expect(openai.parse.mock.calls[0][0].response_format.json_schema.name).toBe('inventory_extraction');
  });

  describe('summarizeTransaction', () => {
    it('returns the model summary', async () => {
      openai.parse.mockResolvedValueOnce(completion({ summary: '  Se vendieron 12 rosas.  ' }));

      await expect(summarizeTransaction(extraction, 'vendimos 12 rosas')).resolves.toBe('Se vendieron 12 rosas.');
    });

    it('falls back to the local description when both models fail', async () => {
      openai.parse.mockRejectedValue(new Error('unavailable'));

      await expect(summarizeTransaction(extraction, 'vendimos 12 rosas')).resolves.toBe(DESCRIPTION);
    });

    it('falls back to the local description for an empty summary', async () => {
      openai.parse.mockResolvedValueOnce(completion({ summary: '   ' }));

      await expect(summarizeTransaction(extraction, 'vendimos 12 rosas')).resolves.toBe(DESCRIPTION);
    });
  });

  describe('describeTransaction', () => {
    it('describes sales, total and expenses', () => {
      expect(describeTransaction(extraction)).toBe(DESCRIPTION);
    });

    it('describes expense-only messages', () => {
      expect(
        describeTransaction({
          total_sale_price: null,
          payment_method: null,
          sales: [],
          expenses: [{ description: 'transporte', amount: 12 }]
        })
      ).toBe('💸 Gastos:\n- transporte: $12.00');
    });

    it('labels a total without payment method', () => {
      expect(
        describeTransaction({ total_sale_price: 5, payment_method: null, sales: [], expenses: [] })
      ).toBe('Total: $5.00 (sin método de pago)');
    });
  });
});
