import OpenAI from 'openai';
import { zodResponseFormat } from 'openai/helpers/zod';
import type { z } from 'zod';
import {
  TransactionExtractionSchema,
  InventoryExtractionSchema,
  TransactionSummarySchema,
  type InventoryExtraction
} from '../schemas/transactionSchema.js';
import type { PaymentMethod, TransactionExtraction } from '../types/index.js';
import { getOpenAIApiKey, appConfig } from '../config/index.js';
import { InterpretationError } from '../utils/errors.js';

export interface InterpretOptions {
  // Model from the runtime bot config; falls back to the static default
  model?: string;
}

function getOpenAIClient(): OpenAI {
  return new OpenAI({
    apiKey: getOpenAIApiKey()
  });
}

/**
 * System prompt for sales and expenses extraction.
 */
const TRANSACTION_SYSTEM_PROMPT = `You are an assistant that extracts structured sales and expenses data from flower shop messages written in Spanish.

Each message may include sales (sold products) or expenses (purchases or operational costs) in free-text form.

## Rules
- If the message describes a purchase, buying, or an operational cost (e.g. "compramos", "gastamos", "pagamos"), create an entry under "expenses".
- If the message describes a sale (e.g. "vendimos", "se vendió"), create an entry under "sales" and set "total_sale_price".
- If the message describes only expenses, "total_sale_price" and "payment_method" must be null.
- Sales without a mentioned payment method are "cash". "transferencia" or "depósito" means "bank_transfer".
- "docena" means 12 units. Do not recalculate the price for "total_sale_price"; use the amount the user gave.
- Use the product name in singular for "item" and put grades such as "premium" or "nacional" in "quality".
- Never invent amounts that are not in the message.`;

/**
 * System prompt for stock counts and losses.
 */
const INVENTORY_SYSTEM_PROMPT = `You are an assistant that extracts inventory lines from flower shop messages written in Spanish.

## Rules
- Produce one entry per product and quality mentioned.
- "docena" means 12 units; "media docena" means 6.
- Use the product name in singular for "item".
- When no quality or grade is mentioned, use "regular".
- Ignore text that is not a product with a quantity.`;

/**
 * System prompt for the confirmation sent back to the user.
 */
const SUMMARY_SYSTEM_PROMPT = `You write short confirmations in Spanish for a flower shop's sales bot.
Given the user's original message and the extracted JSON, summarise in at most four lines what was recorded: products and quantities sold, total and payment method, and expenses with their amounts.
Use plain text with at most one emoji per line. Do not add information that is not in the JSON.`;

/**
 * Extract sales and expenses from a free-text message.
 */
export async function interpretTransaction(
  message: string,
  options: InterpretOptions = {}
): Promise<TransactionExtraction> {
  return await completeStructured({
    schema: TransactionExtractionSchema,
    name: 'transaction_extraction',
    systemPrompt: TRANSACTION_SYSTEM_PROMPT,
    userPrompt: message,
    model: options.model
  });
}

/**
 * Extract inventory lines (stock counts or losses) from a message.
 */
export async function interpretInventory(
  message: string,
  options: InterpretOptions = {}
): Promise<InventoryExtraction> {
  return await completeStructured({
    schema: InventoryExtractionSchema,
    name: 'inventory_extraction',
    systemPrompt: INVENTORY_SYSTEM_PROMPT,
    userPrompt: message,
    model: options.model
  });
}

/**
 * Write the confirmation text for a stored transaction.
 * Falls back to a locally built description if the model call fails.
 */
export async function summarizeTransaction(
  extraction: TransactionExtraction,
  originalMessage: string,
  options: InterpretOptions = {}
): Promise<string> {
  try {
    const result = await completeStructured({
      schema: TransactionSummarySchema,
      name: 'transaction_summary',
      systemPrompt: SUMMARY_SYSTEM_PROMPT,
      userPrompt: `Mensaje original:\n${originalMessage}\n\nDatos extraídos:\n${JSON.stringify(extraction, null, 2)}`,
      model: options.model
    });
    return result.summary.trim() || describeTransaction(extraction);
  } catch (error) {
    console.error('Error generating summary, using local description:', error);
    return describeTransaction(extraction);
  }
}

const PAYMENT_METHOD_LABELS: Record<PaymentMethod, string> = {
  cash: 'efectivo',
  bank_transfer: 'transferencia bancaria'
};

function formatAmount(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

/**
 * Plain description of an extraction, without calling the model.
 */
export function describeTransaction(extraction: TransactionExtraction): string {
  const lines: string[] = [];

  if (extraction.sales.length > 0) {
    lines.push('🌸 Ventas:');
    for (const sale of extraction.sales) {
      const quantity = sale.quantity ?? '?';
      const quality = sale.quality ? ` (${sale.quality})` : '';
      const price = sale.unit_price !== null ? ` a ${formatAmount(sale.unit_price)} c/u` : '';
      lines.push(`- ${quantity} x ${sale.item}${quality}${price}`);
    }
  }

  if (extraction.total_sale_price !== null) {
    const method = extraction.payment_method ? PAYMENT_METHOD_LABELS[extraction.payment_method] : 'sin método de pago';
    lines.push(`Total: ${formatAmount(extraction.total_sale_price)} (${method})`);
  }

  if (extraction.expenses.length > 0) {
    lines.push('💸 Gastos:');
    for (const expense of extraction.expenses) {
      lines.push(`- ${expense.description}: ${formatAmount(expense.amount)}`);
    }
  }

  return lines.join('\n');
}

/**
 * Run a structured completion, retrying once on the fallback model.
 */
async function completeStructured<T extends z.ZodTypeAny>(params: {
  schema: T;
  name: string;
  systemPrompt: string;
  userPrompt: string;
  model?: string;
}): Promise<z.infer<T>> {
  const primaryModel = params.model || appConfig.openai.model;

  try {
    return await requestStructured(primaryModel, params);
  } catch (error) {
    const fallbackModel = appConfig.openai.fallbackModel;
    if (primaryModel === fallbackModel) {
      throw error;
    }
    console.error(`Error with model ${primaryModel}, trying fallback ${fallbackModel}:`, error);
    return await requestStructured(fallbackModel, params);
  }
}

async function requestStructured<T extends z.ZodTypeAny>(
  model: string,
  params: { schema: T; name: string; systemPrompt: string; userPrompt: string }
): Promise<z.infer<T>> {
  const openai = getOpenAIClient();

  const completion = await openai.beta.chat.completions.parse({
    model,
    messages: [
      { role: 'system', content: params.systemPrompt },
      { role: 'user', content: params.userPrompt }
    ],
    response_format: zodResponseFormat(params.schema, params.name),
    temperature: appConfig.openai.temperature
  });

  const result = completion.choices[0]?.message.parsed;
  if (result === null || result === undefined) {
    throw new InterpretationError(`Failed to parse ${params.name} response from ${model}`);
  }
  return params.schema.parse(result);
}
