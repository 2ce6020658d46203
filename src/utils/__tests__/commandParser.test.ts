import { describe, it, expect } from 'vitest';
import { buildHelpText, parseCommand, USAGE } from '../commandParser.js';

describe('parseCommand', () => {
  it('parses eliminar with id and user name', () => {
    expect(parseCommand('eliminar abc-123 Ana')).toEqual({
      kind: 'delete',
      transactionId: 'abc-123',
      userName: 'Ana'
    });
  });

  it('rejects eliminar without exactly two arguments', () => {
    expect(parseCommand('eliminar abc-123')).toEqual({
      kind: 'usage',
      command: 'delete',
      usage: USAGE.delete
    });
    expect(parseCommand('eliminar abc-123 Ana Maria')).toEqual({
      kind: 'usage',
      command: 'delete',
      usage: USAGE.delete
    });
  });

  it('keeps the whole replacement text of editar', () => {
    expect(parseCommand('editar abc-123 vendimos 3 rosas\npor $9 en efectivo')).toEqual({
      kind: 'edit',
      transactionId: 'abc-123',
      text: 'vendimos 3 rosas\npor $9 en efectivo'
    });
  });

  it('rejects editar without a new message', () => {
    expect(parseCommand('editar abc-123')).toEqual({
      kind: 'usage',
      command: 'edit',
      usage: USAGE.edit
    });
  });

  it('parses cierre with and without a date', () => {
    expect(parseCommand('cierre Ana')).toEqual({
      kind: 'closure',
      userName: 'Ana',
      dateExpression: null
    });
    expect(parseCommand('cierre Ana el lunes')).toEqual({
      kind: 'closure',
      userName: 'Ana',
      dateExpression: 'el lunes'
    });
  });

  it('rejects cierre without a user name', () => {
    expect(parseCommand('cierre')).toEqual({
      kind: 'usage',
      command: 'closure',
      usage: 'Formato incorrecto. Usa: cierre <nombre del usuario> [fecha]'
    });
  });

  it('matches keywords case-insensitively', () => {
    expect(parseCommand('ELIMINAR x Ana')).toEqual({
      kind: 'delete',
      transactionId: 'x',
      userName: 'Ana'
    });
    expect(parseCommand('Ayuda')).toEqual({ kind: 'help' });
    expect(parseCommand('/help')).toEqual({ kind: 'help' });
    expect(parseCommand('Última')).toEqual({ kind: 'last' });
    expect(parseCommand('ultima')).toEqual({ kind: 'last' });
  });

  it('extracts the inventory body after the colon', () => {
    expect(parseCommand('Inventario: 10 rosas rojas premium, 5 girasoles')).toEqual({
      kind: 'inventory',
      body: '10 rosas rojas premium, 5 girasoles'
    });
    expect(parseCommand('inventario:')).toEqual({
      kind: 'usage',
      command: 'inventory',
      usage: USAGE.inventory
    });
  });

  it('accepts perdida with or without accent', () => {
    expect(parseCommand('pérdida: 2 rosas')).toEqual({ kind: 'loss', body: '2 rosas' });
    expect(parseCommand('perdida : 2 rosas')).toEqual({ kind: 'loss', body: '2 rosas' });
  });

  it('treats anything else as a transaction to insert', () => {
    expect(parseCommand('  vendimos 2 rosas por $10 en efectivo  ')).toEqual({
      kind: 'insert',
      text: 'vendimos 2 rosas por $10 en efectivo'
    });
  });

  it('reads ayuda and ultima as commands only when they stand alone', () => {
    expect(parseCommand('  última  ')).toEqual({ kind: 'last' });
    expect(parseCommand('última venta del día: 2 rosas por $10 en efectivo')).toEqual({
      kind: 'insert',
      text: 'última venta del día: 2 rosas por $10 en efectivo'
    });
    expect(parseCommand('ayuda con la venta de 3 rosas')).toEqual({
      kind: 'insert',
      text: 'ayuda con la venta de 3 rosas'
    });
  });

  it('does not mistake words starting with a keyword for the command', () => {
    expect(parseCommand('eliminarlo todo ya')).toEqual({
      kind: 'insert',
      text: 'eliminarlo todo ya'
    });
  });
});

describe('buildHelpText', () => {
  it('lists every command', () => {
    const help = buildHelpText();
    expect(help.split('\n')[0]).toBe('📚 Comandos disponibles:');
    for (const keyword of ['eliminar', 'editar', 'cierre', 'ultima', 'inventario:', 'perdida:']) {
      expect(help).toContain(`• ${keyword}`);
    }
  });
});
