import type {
  TransactionExtraction,
  SaleLine,
  ExpenseLine,
  InventoryEntry,
  PaymentMethod
} from '../schemas/transactionSchema.js';

export type { TransactionExtraction, SaleLine, ExpenseLine, InventoryEntry, PaymentMethod };

// Configuration types
export type { AppConfig, BotConfig } from '../schemas/configSchema.js';

export interface BigQueryTarget {
  projectId: string;
  datasetId: string;
  tableId: string;
}

// Ledger types
export type LedgerOperation = 'deleted';

/**
 * A row of the transactions table. Rows are never updated in place:
 * deletions and edits append new rows under the same transaction_id.
 */
export interface TransactionRecord {
  transaction_id: string;
  date: string;
  recorded_at: string;
  total_sale_price: number | null;
  payment_method: PaymentMethod | null;
  sales: SaleLine[];
  expenses: ExpenseLine[];
  operation: LedgerOperation | null;
  is_deleted: boolean;
  user_id: number | null;
  user_name: string | null;
}

export type NewTransaction = Omit<TransactionRecord, 'transaction_id' | 'recorded_at' | 'operation' | 'is_deleted'> & {
  transaction_id?: string;
};

export interface ClosureReport {
  date: string;
  cashSales: number;
  transferSales: number;
  totalExpenses: number;
  cashInRegister: number;
  transactionCount: number;
}

// Audit types
export type AuditOperation =
  | 'unauthorized_access'
  | 'data_insert'
  | 'delete_transaction'
  | 'edit_transaction'
  | 'closure_report'
  | 'bulk_inventory_update'
  | 'inventory_loss';

export interface AuditLogEntry {
  timestamp: string;
  user_id: number;
  chat_id: number;
  operation_type: AuditOperation;
  message_content: string;
  user_name: string;
  transaction_id: string | null;
}

// Inventory types
export interface InventoryLine {
  item: string;
  quality?: string | null;
  quantity?: number | null;
}

export interface InventoryIssue {
  timestamp: string;
  transaction_id: string;
  item: string;
  quality: string;
  requested_qty: number;
  reason: string;
}

export interface InventoryLoss {
  timestamp: string;
  user_id: number;
  user_name: string;
  chat_id: number;
  item: string;
  quality: string;
  quantity: number;
  original_message: string;
}

// Telegram types
export interface IncomingMessage {
  chatId: number;
  userId: number;
  fullName: string;
  text: string;
}

export interface SendOptions {
  parse_mode?: 'MarkdownV2';
}

/**
 * The slice of the Telegram client the handlers need. Telegraf's
 * `Telegram` instance satisfies it.
 */
export interface MessageSender {
  sendMessage(chatId: number, text: string, extra?: SendOptions): Promise<unknown>;
}
