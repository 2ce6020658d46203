import { BigQuery } from '@google-cloud/bigquery';
import { v4 as uuidv4 } from 'uuid';
import { getBigQueryTarget, getConfig } from '../config/index.js';
import { ClosureRowSchema, TransactionRowSchema } from '../schemas/transactionSchema.js';
import { todayInZone } from '../utils/dateResolver.js';
import { TransactionNotFoundError } from '../utils/errors.js';
import type {
  AuditLogEntry,
  ClosureReport,
  NewTransaction,
  TransactionRecord
} from '../types/index.js';

let client: BigQuery | null = null;

function getBigQueryClient(): BigQuery {
  if (!client) {
    client = new BigQuery({ projectId: getBigQueryTarget().projectId });
  }
  return client;
}

function getTransactionsTable() {
  const { datasetId, tableId } = getBigQueryTarget();
  return getBigQueryClient().dataset(datasetId).table(tableId);
}

function getAuditTable() {
  const { datasetId } = getBigQueryTarget();
  return getBigQueryClient().dataset(datasetId).table(getConfig().bigquery.auditTable);
}

/**
 * Fully qualified, quoted name of the transactions table.
 */
function transactionsTableSql(): string {
  const { projectId, datasetId, tableId } = getBigQueryTarget();
  return `\`${projectId}.${datasetId}.${tableId}\``;
}

/**
 * CTEs selecting the live version of each transaction.
 *
 * The ledger is append-only: the newest row of a transaction_id (by
 * recorded_at) is its current state, and a transaction whose newest row is a
 * deletion marker is gone.
 */
function liveTransactionsSql(filter: string = 'TRUE'): string {
  return `WITH latest_versions AS (
  SELECT *
  FROM ${transactionsTableSql()}
  WHERE ${filter}
  QUALIFY ROW_NUMBER() OVER (PARTITION BY transaction_id ORDER BY recorded_at DESC) = 1
),
live_transactions AS (
  SELECT *
  FROM latest_versions
  WHERE operation IS NULL
)`;
}

/**
 * Append rows to the transactions table.
 */
async function insertRows(rows: TransactionRecord[]): Promise<void> {
  await getTransactionsTable().insert(rows);
}

/**
 * Store a new transaction and return its id.
 */
export async function insertTransaction(data: NewTransaction): Promise<string> {
  const record: TransactionRecord = {
    ...data,
    transaction_id: data.transaction_id || uuidv4(),
    recorded_at: new Date().toISOString(),
    operation: null,
    is_deleted: false
  };

  await insertRows([record]);
  console.log(`Stored transaction ${record.transaction_id}`);
  return record.transaction_id;
}

/**
 * Get the live version of a transaction, or null if it does not exist or was deleted.
 */
export async function getTransactionById(transactionId: string): Promise<TransactionRecord | null> {
  const [rows] = await getBigQueryClient().query({
    query: `${liveTransactionsSql('transaction_id = @transactionId')}
SELECT *
FROM live_transactions
LIMIT 1`,
    params: { transactionId }
  });

  const row: unknown = rows[0];
  return row === undefined ? null : TransactionRowSchema.parse(row);
}

/**
 * Id of the most recently recorded live transaction.
 */
export async function getLastTransactionId(): Promise<string | null> {
  const [rows] = await getBigQueryClient().query({
    query: `${liveTransactionsSql()}
SELECT transaction_id
FROM live_transactions
ORDER BY recorded_at DESC
LIMIT 1`
  });

  const row: unknown = rows[0];
  if (row === undefined) {
    return null;
  }
  return TransactionRowSchema.pick({ transaction_id: true }).parse(row).transaction_id;
}

/**
 * Delete a transaction by appending a deletion marker.
 * The original rows stay in the table for auditing.
 */
export async function safeDelete(transactionId: string, deletedAt: Date = new Date()): Promise<TransactionRecord> {
  const original = await getTransactionById(transactionId);
  if (!original) {
    throw new TransactionNotFoundError(transactionId);
  }

  await insertRows([
    {
      ...original,
      recorded_at: deletedAt.toISOString(),
      operation: 'deleted',
      is_deleted: true
    }
  ]);

  console.log(`Marked transaction ${transactionId} as deleted`);
  return original;
}

/**
 * Replace a transaction: delete the live version and record the new data
 * under the same id.
 */
export async function safeEdit(transactionId: string, data: NewTransaction): Promise<void> {
  const deletedAt = new Date();
  await safeDelete(transactionId, deletedAt);

  // One millisecond after the marker so the replacement is always the newest row
  const replacement: TransactionRecord = {
    ...data,
    transaction_id: transactionId,
    date: data.date || todayInZone(getConfig().timezone),
    recorded_at: new Date(deletedAt.getTime() + 1).toISOString(),
    operation: null,
    is_deleted: false
  };

  await insertRows([replacement]);
  console.log(`Replaced transaction ${transactionId}`);
}

/**
 * Totals of the live transactions of a day, or null when there are none.
 */
export async function getClosureReportByDate(date: string): Promise<ClosureReport | null> {
  const [rows] = await getBigQueryClient().query({
    query: `${liveTransactionsSql()},
day_transactions AS (
  SELECT *
  FROM live_transactions
  WHERE date = @date
)
SELECT
  (SELECT COUNT(*) FROM day_transactions) AS transaction_count,
  (SELECT SUM(total_sale_price) FROM day_transactions WHERE payment_method = 'cash') AS cash_sales,
  (SELECT SUM(total_sale_price) FROM day_transactions WHERE payment_method = 'bank_transfer') AS transfer_sales,
  (SELECT SUM(expense.amount) FROM day_transactions, UNNEST(expenses) AS expense) AS total_expenses`,
    params: { date },
    types: { date: 'DATE' }
  });

  const row: unknown = rows[0];
  if (row === undefined) {
    return null;
  }

  const totals = ClosureRowSchema.parse(row);
  if (totals.transaction_count === 0) {
    return null;
  }

  const cashSales = totals.cash_sales ?? 0;
  const totalExpenses = totals.total_expenses ?? 0;

  return {
    date,
    cashSales,
    transferSales: totals.transfer_sales ?? 0,
    totalExpenses,
    cashInRegister: cashSales - totalExpenses,
    transactionCount: totals.transaction_count
  };
}

/**
 * Append an entry to the audit log. Failures are logged, never thrown.
 */
export async function logAudit(entry: AuditLogEntry): Promise<void> {
  try {
    await getAuditTable().insert([entry]);
  } catch (error) {
    console.error(`Audit log insert errors for ${entry.operation_type}:`, error);
  }
}
