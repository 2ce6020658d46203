import type {
  ClosureReport,
  InventoryIssue,
  MessageSender,
  SendOptions
} from '../types/index.js';
import { errorMessage } from '../utils/errors.js';

/**
 * Send a message, optionally under a Telegram parse mode.
 */
export async function safeSendMessage(
  sender: MessageSender,
  chatId: number,
  text: string,
  options: { parseMode?: SendOptions['parse_mode'] } = {}
): Promise<void> {
  if (options.parseMode) {
    await sender.sendMessage(chatId, text, { parse_mode: options.parseMode });
    return;
  }
  await sender.sendMessage(chatId, text);
}

/**
 * Send a transaction id on its own as a code span so it can be copied with one tap.
 */
export async function sendTransactionId(
  sender: MessageSender,
  chatId: number,
  transactionId: string
): Promise<void> {
  await safeSendMessage(sender, chatId, `\`${transactionId.replace(/[`\\]/g, '\\$&')}\``, {
    parseMode: 'MarkdownV2'
  });
}

/**
 * Build the owner notification text for an administrative action.
 */
export function formatAdminNotification(params: {
  userName: string;
  userId: number;
  action: string;
  details: string[];
}): string {
  const { userName, userId, action, details } = params;
  return [
    '🔔 Notificación de administración:',
    '',
    `Operación realizada por ${userName} (ID: ${userId})`,
    `Acción: ${action}`,
    ...details
  ].join('\n');
}

/**
 * Notify the owner of an operation. Delivery failures are logged and never
 * surface to the user who triggered the operation.
 */
export async function notifyOwner(
  sender: MessageSender,
  ownerId: number,
  text: string
): Promise<void> {
  try {
    await safeSendMessage(sender, ownerId, text);
  } catch (error) {
    console.error(`Error notifying owner ${ownerId}:`, error);
  }
}

/**
 * Send inventory problems found while processing a sale or loss to the owner.
 */
export async function reportInventoryIssues(
  sender: MessageSender,
  ownerId: number,
  header: string,
  issues: InventoryIssue[]
): Promise<void> {
  if (issues.length === 0) {
    return;
  }
  const lines = issues.map(issue => `- ${issue.item} (${issue.quality}): ${issue.reason}`);
  await notifyOwner(sender, ownerId, `${header}\n${lines.join('\n')}`);
}

/**
 * Tell the user their request failed and, when a developer is configured,
 * send them an error report.
 */
export async function notifyDeveloperError(
  sender: MessageSender,
  params: {
    developerId?: number;
    chatId: number;
    userName: string;
    userId: number;
    action: string;
    error: unknown;
  }
): Promise<void> {
  const { developerId, chatId, userName, userId, action, error } = params;

  if (developerId) {
    try {
      await safeSendMessage(
        sender,
        developerId,
        `🚨 Error Report:\n\nUser: ${userName} (ID: ${userId})\nAction: ${action}\nError: ${errorMessage(error)}`
      );
    } catch (reportError) {
      console.error('Error sending error report to developer:', reportError);
    }
  }

  await safeSendMessage(
    sender,
    chatId,
    '❌ Hubo un error al procesar tu solicitud. El desarrollador ha sido notificado, por favor intenta más tarde.'
  );
}

function formatAmount(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

/**
 * Text of the daily closure report.
 */
export function formatClosureReport(report: ClosureReport): string {
  return [
    `🔔 Resumen del cierre de caja (${report.date}):`,
    '',
    `🏦 Ventas por transferencia bancaria: ${formatAmount(report.transferSales)}`,
    `💵 Ventas en efectivo: ${formatAmount(report.cashSales)}`,
    `💰 Gastos del día: ${formatAmount(report.totalExpenses)}`,
    `💵 Total efectivo en caja: ${formatAmount(report.cashInRegister)}`,
    `🧾 Transacciones: ${report.transactionCount}`
  ].join('\n');
}
