/**
 * Text command parsing.
 *
 * Every text message the bot receives is either one of the keyword commands
 * below or free text describing sales and expenses.
 */

export type CommandName = 'delete' | 'edit' | 'closure' | 'inventory' | 'loss';

export type BotCommand =
  | { kind: 'help' }
  | { kind: 'last' }
  | { kind: 'delete'; transactionId: string; userName: string }
  | { kind: 'edit'; transactionId: string; text: string }
  | { kind: 'closure'; userName: string; dateExpression: string | null }
  | { kind: 'inventory'; body: string }
  | { kind: 'loss'; body: string }
  | { kind: 'insert'; text: string }
  | { kind: 'usage'; command: CommandName; usage: string };

export const USAGE: Record<CommandName, string> = {
  delete: 'Formato incorrecto. Usa: eliminar <transaction_id> <nombre del usuario>',
  edit: 'Formato incorrecto. Usa: editar <transaction_id> <nuevo mensaje>',
  closure: 'Formato incorrecto. Usa: cierre <nombre del usuario> [fecha]',
  inventory: 'Formato incorrecto. Usa: inventario: <productos y cantidades>',
  loss: 'Formato incorrecto. Usa: perdida: <productos y cantidades>'
};

const INVENTORY_PATTERN = /^inventario\s*:([\s\S]*)$/i;
const LOSS_PATTERN = /^p[eé]rdida\s*:([\s\S]*)$/i;
const EDIT_PATTERN = /^\S+\s+(\S+)\s+(\S[\s\S]*)$/;

function usage(command: CommandName): BotCommand {
  return { kind: 'usage', command, usage: USAGE[command] };
}

/**
 * Parse a message into a command.
 */
export function parseCommand(message: string): BotCommand {
  const text = message.trim();
  const words = text.split(/\s+/);
  const keyword = words[0].toLowerCase();

  const inventoryMatch = text.match(INVENTORY_PATTERN);
  if (inventoryMatch) {
    const body = inventoryMatch[1].trim();
    return body ? { kind: 'inventory', body } : usage('inventory');
  }

  const lossMatch = text.match(LOSS_PATTERN);
  if (lossMatch) {
    const body = lossMatch[1].trim();
    return body ? { kind: 'loss', body } : usage('loss');
  }

  // Single-word commands; longer text starting with these words is a transaction
  if (words.length === 1) {
    switch (keyword) {
      case 'ayuda':
      case '/ayuda':
      case '/help':
        return { kind: 'help' };

      case 'ultima':
      case 'última':
        return { kind: 'last' };
    }
  }

  switch (keyword) {

    case 'eliminar':
      if (words.length !== 3) {
        return usage('delete');
      }
      return { kind: 'delete', transactionId: words[1], userName: words[2] };

    case 'editar': {
      const match = text.match(EDIT_PATTERN);
      if (!match) {
        return usage('edit');
      }
      return { kind: 'edit', transactionId: match[1], text: match[2].trim() };
    }

    case 'cierre':
      if (words.length < 2) {
        return usage('closure');
      }
      return {
        kind: 'closure',
        userName: words[1],
        dateExpression: words.length > 2 ? words.slice(2).join(' ') : null
      };

    default:
      return { kind: 'insert', text };
  }
}

/**
 * Help text listing the available commands.
 */
export function buildHelpText(): string {
  return [
    '📚 Comandos disponibles:',
    '',
    '• Escribe una venta o gasto en texto libre, por ejemplo: "vendimos 2 docenas de rosas por $30 en efectivo"',
    '• eliminar <transaction_id> <nombre> - Elimina una transacción',
    '• editar <transaction_id> <nuevo mensaje> - Reemplaza una transacción',
    '• cierre <nombre> [fecha] - Cierre de caja de hoy o de la fecha indicada (ayer, lunes, 2024-05-01)',
    '• ultima - Muestra el ID de la última transacción',
    '• inventario: <productos y cantidades> - Actualiza el inventario',
    '• perdida: <productos y cantidades> - Registra pérdidas de inventario'
  ].join('\n');
}
