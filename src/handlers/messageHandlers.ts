import {
  insertTransaction,
  getTransactionById,
  getLastTransactionId,
  safeDelete,
  safeEdit,
  getClosureReportByDate,
  logAudit
} from '../services/bigqueryService.js';
import {
  deductInventory,
  setInventory,
  restoreLines,
  recordLoss
} from '../services/inventoryService.js';
import { interpretTransaction, interpretInventory, summarizeTransaction } from '../services/openaiService.js';
import {
  safeSendMessage,
  sendTransactionId,
  notifyOwner,
  notifyDeveloperError,
  reportInventoryIssues,
  formatAdminNotification,
  formatClosureReport
} from '../services/telegramService.js';
import { parseCommand, buildHelpText, type BotCommand } from '../utils/commandParser.js';
import { resolveReportDate, timestampInZone, todayInZone } from '../utils/dateResolver.js';
import type {
  AuditOperation,
  BotConfig,
  IncomingMessage,
  InventoryIssue,
  MessageSender,
  TransactionExtraction
} from '../types/index.js';

/**
 * Everything a handler needs for one webhook invocation.
 */
export interface BotSession {
  sender: MessageSender;
  allowedUsers: Set<number>;
  config: BotConfig;
  timezone: string;
}

// Transaction id stored on issues raised while recording a loss
export const LOSS_TRANSACTION_ID = 'PERDIDA';

type CommandOf<K extends BotCommand['kind']> = Extract<BotCommand, { kind: K }>;

/**
 * Greeting for /start.
 */
export async function handleStart(session: BotSession, chatId: number): Promise<void> {
  const shop = session.config.shopName ? ` para ${session.config.shopName}` : '';
  await safeSendMessage(
    session.sender,
    chatId,
    `Hola, soy tu bot de ventas y gastos${shop} 🌸\n\nEscribe "ayuda" para ver los comandos disponibles.`
  );
}

/**
 * Route a text message from Telegram.
 */
export async function handleTextMessage(session: BotSession, message: IncomingMessage): Promise<void> {
  if (!session.allowedUsers.has(message.userId)) {
    await handleUnauthorizedAccess(session, message);
    return;
  }

  if (!message.text.trim()) {
    return;
  }

  const command = parseCommand(message.text);
  console.log(`Command ${command.kind} from user ${message.userId}`);

  switch (command.kind) {
    case 'help':
      await safeSendMessage(session.sender, message.chatId, buildHelpText());
      break;

    case 'usage':
      await safeSendMessage(session.sender, message.chatId, command.usage);
      break;

    case 'delete':
      await runCommand(session, message, 'eliminar', () => handleDelete(session, message, command));
      break;

    case 'edit':
      await runCommand(session, message, 'editar', () => handleEdit(session, message, command));
      break;

    case 'closure':
      await runCommand(session, message, 'cierre', () => handleClosureReport(session, message, command));
      break;

    case 'last':
      await runCommand(session, message, 'ultima', () => handleLastTransaction(session, message));
      break;

    case 'inventory':
      await runCommand(session, message, 'inventario', () => handleInventoryUpdate(session, message, command));
      break;

    case 'loss':
      await runCommand(session, message, 'perdida', () => handleInventoryLoss(session, message, command));
      break;

    case 'insert':
      await runCommand(session, message, 'insertar', () => handleDataInsert(session, message));
      break;
  }
}

/**
 * Run a command, reporting any failure to the user and the developer.
 */
async function runCommand(
  session: BotSession,
  message: IncomingMessage,
  action: string,
  command: () => Promise<void>
): Promise<void> {
  try {
    await command();
  } catch (error) {
    console.error(`Error handling ${action} for user ${message.userId}:`, error);
    await notifyDeveloperError(session.sender, {
      developerId: session.config.developerID,
      chatId: message.chatId,
      userName: message.fullName,
      userId: message.userId,
      action,
      error
    });
  }
}

async function audit(
  session: BotSession,
  message: IncomingMessage,
  operation: AuditOperation,
  details: { content?: string; userName?: string; transactionId?: string | null } = {}
): Promise<void> {
  await logAudit({
    timestamp: timestampInZone(session.timezone),
    user_id: message.userId,
    chat_id: message.chatId,
    operation_type: operation,
    message_content: details.content ?? message.text,
    user_name: details.userName ?? message.fullName,
    transaction_id: details.transactionId ?? null
  });
}

async function notifyOwnerIfLive(session: BotSession, text: string): Promise<void> {
  if (!session.config.liveNotifications) {
    return;
  }
  await notifyOwner(session.sender, session.config.ownerID, text);
}

function hasEntries(extraction: TransactionExtraction): boolean {
  return extraction.sales.length > 0 || extraction.expenses.length > 0;
}

async function handleUnauthorizedAccess(session: BotSession, message: IncomingMessage): Promise<void> {
  console.warn(`Unauthorized access attempt by user ${message.userId}`);
  await safeSendMessage(
    session.sender,
    message.chatId,
    `Tu ID de usuario de Telegram es: ${message.userId}\nCompártelo con el administrador para que te dé acceso.`
  );
  await audit(session, message, 'unauthorized_access');
}

/**
 * Free text: extract sales and expenses, store them and deduct sold stock.
 */
async function handleDataInsert(session: BotSession, message: IncomingMessage): Promise<void> {
  const { sender, config } = session;
  const extraction = await interpretTransaction(message.text, { model: config.gptModel });

  if (!hasEntries(extraction)) {
    await safeSendMessage(sender, message.chatId, 'No se encontró ninguna venta ni gasto en el mensaje.');
    return;
  }

  // Stored before touching inventory so the record exists even if stock updates fail
  const transactionId = await insertTransaction({
    ...extraction,
    date: todayInZone(session.timezone),
    user_id: message.userId,
    user_name: message.fullName
  });

  if (extraction.sales.length > 0) {
    const issues = await deductInventory(extraction.sales, transactionId);
    await reportInventoryIssues(sender, config.ownerID, '⚠️ Problemas con el inventario:', issues);
  }

  await audit(session, message, 'data_insert', { transactionId });

  const summary = await summarizeTransaction(extraction, message.text, { model: config.gptModel });
  await safeSendMessage(sender, message.chatId, `${summary}\n\n✅ ID de Transacción guardada correctamente.`);
  await sendTransactionId(sender, message.chatId, transactionId);

  await notifyOwnerIfLive(
    session,
    `🔔 Nueva operación registrada por ${message.fullName} (ID: ${message.userId}):\n\n${message.text}\n\nID de Transacción: ${transactionId}`
  );
}

async function handleDelete(
  session: BotSession,
  message: IncomingMessage,
  command: CommandOf<'delete'>
): Promise<void> {
  const { sender } = session;
  const transaction = await getTransactionById(command.transactionId);

  if (!transaction) {
    await safeSendMessage(sender, message.chatId, '❌ Transacción no encontrada.');
    return;
  }

  // Stock moves only after the ledger write succeeds
  await safeDelete(command.transactionId);
  await restoreLines(transaction.sales);

  await safeSendMessage(sender, message.chatId, '✅ ID de Transacción eliminada correctamente.');
  await sendTransactionId(sender, message.chatId, command.transactionId);

  await audit(session, message, 'delete_transaction', {
    userName: command.userName,
    transactionId: command.transactionId
  });

  await notifyOwnerIfLive(
    session,
    formatAdminNotification({
      userName: command.userName,
      userId: message.userId,
      action: 'Eliminar',
      details: [`ID de Transacción: ${command.transactionId}`]
    })
  );
}

/**
 * Replace a transaction with the data extracted from new text.
 * Stock of the old sales is restored and the new sales are deducted.
 */
async function handleEdit(
  session: BotSession,
  message: IncomingMessage,
  command: CommandOf<'edit'>
): Promise<void> {
  const { sender, config } = session;
  const existing = await getTransactionById(command.transactionId);

  if (!existing) {
    await safeSendMessage(sender, message.chatId, '❌ Transacción no encontrada.');
    return;
  }

  const extraction = await interpretTransaction(command.text, { model: config.gptModel });
  if (!hasEntries(extraction)) {
    await safeSendMessage(sender, message.chatId, 'No se encontró ninguna venta ni gasto en el nuevo mensaje.');
    return;
  }

  await safeEdit(command.transactionId, {
    ...extraction,
    date: existing.date,
    user_id: message.userId,
    user_name: message.fullName
  });
  await restoreLines(existing.sales);

  if (extraction.sales.length > 0) {
    const issues = await deductInventory(extraction.sales, command.transactionId);
    await reportInventoryIssues(sender, config.ownerID, '⚠️ Problemas con el inventario:', issues);
  }

  await safeSendMessage(sender, message.chatId, '✅ ID de Transacción actualizada correctamente.');
  await sendTransactionId(sender, message.chatId, command.transactionId);

  await audit(session, message, 'edit_transaction', { transactionId: command.transactionId });

  await notifyOwnerIfLive(
    session,
    formatAdminNotification({
      userName: message.fullName,
      userId: message.userId,
      action: 'Editar',
      details: [`ID de Transacción: ${command.transactionId}`]
    })
  );
}

async function handleClosureReport(
  session: BotSession,
  message: IncomingMessage,
  command: CommandOf<'closure'>
): Promise<void> {
  const { sender } = session;
  const today = todayInZone(session.timezone);
  const date = command.dateExpression ? resolveReportDate(command.dateExpression, today) : today;

  if (!date) {
    await safeSendMessage(
      sender,
      message.chatId,
      `No entendí la fecha "${command.dateExpression}". Usa hoy, ayer, un día de la semana o AAAA-MM-DD.`
    );
    return;
  }

  const report = await getClosureReportByDate(date);
  if (!report) {
    const noData = date === today ? 'No hay datos para el cierre de hoy.' : `No hay datos para el cierre del ${date}.`;
    await safeSendMessage(sender, message.chatId, noData);
    return;
  }

  const reportText = formatClosureReport(report);
  await safeSendMessage(sender, message.chatId, reportText);

  await audit(session, message, 'closure_report', {
    content: `Cierre de caja para ${date}`,
    userName: command.userName
  });

  await notifyOwnerIfLive(
    session,
    formatAdminNotification({
      userName: command.userName,
      userId: message.userId,
      action: 'Cierre de caja',
      details: [`Fecha: ${date}`, '', reportText]
    })
  );
}

async function handleLastTransaction(session: BotSession, message: IncomingMessage): Promise<void> {
  const transactionId = await getLastTransactionId();

  if (!transactionId) {
    await safeSendMessage(session.sender, message.chatId, 'No hay transacciones registradas.');
    return;
  }

  await safeSendMessage(session.sender, message.chatId, 'Última transacción registrada:');
  await sendTransactionId(session.sender, message.chatId, transactionId);
}

/**
 * "inventario:" sets absolute stock counts.
 */
async function handleInventoryUpdate(
  session: BotSession,
  message: IncomingMessage,
  command: CommandOf<'inventory'>
): Promise<void> {
  const { sender, config } = session;
  const { inventory } = await interpretInventory(command.body, { model: config.gptModel });

  if (inventory.length === 0) {
    await safeSendMessage(sender, message.chatId, 'No se encontraron entradas válidas para el inventario en el mensaje.');
    return;
  }

  for (const entry of inventory) {
    await setInventory(entry.item, entry.quality, entry.quantity);
  }

  await audit(session, message, 'bulk_inventory_update', { content: command.body });
  await safeSendMessage(sender, message.chatId, `✅ Inventario actualizado con ${inventory.length} entradas.`);

  await notifyOwnerIfLive(
    session,
    formatAdminNotification({
      userName: message.fullName,
      userId: message.userId,
      action: 'Actualización de inventario',
      details: [`Mensaje: ${message.text}`]
    })
  );
}

/**
 * "perdida:" deducts spoiled or discarded units and records each loss.
 */
async function handleInventoryLoss(
  session: BotSession,
  message: IncomingMessage,
  command: CommandOf<'loss'>
): Promise<void> {
  const { sender, config } = session;
  const { inventory } = await interpretInventory(command.body, { model: config.gptModel });

  if (inventory.length === 0) {
    await safeSendMessage(sender, message.chatId, 'No se encontraron entradas válidas para la pérdida en el mensaje.');
    return;
  }

  const timestamp = timestampInZone(session.timezone);
  const issues: InventoryIssue[] = [];

  for (const entry of inventory) {
    issues.push(...await deductInventory([entry], LOSS_TRANSACTION_ID));
    await recordLoss({
      timestamp,
      user_id: message.userId,
      user_name: message.fullName,
      chat_id: message.chatId,
      item: entry.item,
      quality: entry.quality,
      quantity: entry.quantity,
      original_message: message.text
    });
  }

  await audit(session, message, 'inventory_loss');
  await safeSendMessage(
    sender,
    message.chatId,
    `✅ Inventario actualizado. Se registró la pérdida de ${inventory.length} entradas.`
  );
  await reportInventoryIssues(sender, config.ownerID, '⚠️ Problemas al registrar la pérdida:', issues);

  await notifyOwnerIfLive(
    session,
    formatAdminNotification({
      userName: message.fullName,
      userId: message.userId,
      action: 'Pérdida de inventario',
      details: [`Mensaje: ${message.text}`]
    })
  );
}
