import { z } from 'zod';

export const PaymentMethodSchema = z.enum(['cash', 'bank_transfer']);

/**
 * Schema for a single sold product extracted from a message.
 */
export const SaleLineSchema = z.object({
  item: z.string().describe('Product sold, in singular, as written by the user'),
  quality: z.string().nullable().describe('Quality or grade of the product if mentioned (e.g. "premium"), otherwise null'),
  quantity: z.number().int().nullable().describe('Units sold; "docena" means 12. Null if not stated'),
  unit_price: z.number().nullable().describe('Price per unit if stated, otherwise null')
});

/**
 * Schema for a purchase or operational cost extracted from a message.
 */
export const ExpenseLineSchema = z.object({
  description: z.string().describe('What the money was spent on'),
  amount: z.number().describe('Amount spent')
});

/**
 * Schema for the structured sales/expenses extraction response.
 */
export const TransactionExtractionSchema = z.object({
  total_sale_price: z.number().nullable().describe('Sum of all sales exactly as the user stated it; null if the message only has expenses'),
  payment_method: PaymentMethodSchema.nullable().describe('Payment method for the sales, "cash" when not mentioned; null if the message only has expenses'),
  sales: z.array(SaleLineSchema).describe('Products sold'),
  expenses: z.array(ExpenseLineSchema).describe('Purchases or operational costs')
});

/**
 * Schema for an inventory line (stock count or loss).
 */
export const InventoryEntrySchema = z.object({
  item: z.string().describe('Product name in singular'),
  quality: z.string().describe('Quality or grade of the product, "regular" when not mentioned'),
  quantity: z.number().int().describe('Number of units; "docena" means 12')
});

export const InventoryExtractionSchema = z.object({
  inventory: z.array(InventoryEntrySchema).describe('Inventory lines found in the message')
});

/**
 * Schema for the confirmation summary returned to the user.
 */
export const TransactionSummarySchema = z.object({
  summary: z.string().describe('Short summary in Spanish of what was recorded')
});

// DATE and TIMESTAMP columns come back from the client as { value } wrappers
const WarehouseDateSchema = z.union([
  z.string(),
  z.object({ value: z.string() }).transform(wrapped => wrapped.value)
]);

// Older rows may lack columns added later, so missing values read as null
const nullishAsNull = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform((value): z.infer<T> | null => value ?? null);

const SaleLineRowSchema = z.object({
  item: z.string(),
  quality: nullishAsNull(z.string()),
  quantity: nullishAsNull(z.number()),
  unit_price: nullishAsNull(z.number())
});

/**
 * Schema for a transactions row read back from the warehouse.
 */
export const TransactionRowSchema = z.object({
  transaction_id: z.string(),
  date: WarehouseDateSchema,
  recorded_at: WarehouseDateSchema,
  total_sale_price: z.number().nullable(),
  payment_method: PaymentMethodSchema.nullable(),
  sales: z.array(SaleLineRowSchema).nullish().transform(lines => lines ?? []),
  expenses: z.array(ExpenseLineSchema).nullish().transform(lines => lines ?? []),
  operation: z.literal('deleted').nullable(),
  is_deleted: z.boolean().nullish().transform(flag => flag ?? false),
  user_id: nullishAsNull(z.number()),
  user_name: nullishAsNull(z.string())
});

/**
 * Schema for the aggregated closure query row.
 */
export const ClosureRowSchema = z.object({
  transaction_count: z.coerce.number(),
  cash_sales: z.number().nullable(),
  transfer_sales: z.number().nullable(),
  total_expenses: z.number().nullable()
});

// Export types derived from schemas
export type PaymentMethod = z.infer<typeof PaymentMethodSchema>;
export type SaleLine = z.infer<typeof SaleLineSchema>;
export type ExpenseLine = z.infer<typeof ExpenseLineSchema>;
export type TransactionExtraction = z.infer<typeof TransactionExtractionSchema>;
export type InventoryEntry = z.infer<typeof InventoryEntrySchema>;
export type InventoryExtraction = z.infer<typeof InventoryExtractionSchema>;
