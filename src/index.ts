/**
 * Sales Ledger Bot - Main Entry Point
 *
 * This file exports the Cloud Function for deployment.
 */

import { telegramBot } from './functions/telegramBot.js';

// Export Cloud Function (deployed with --entry-point telegram_bot)
export { telegramBot };
export const telegram_bot = telegramBot;

// Re-export services for testing and direct use
export * as bigqueryService from './services/bigqueryService.js';
export * as firestoreService from './services/firestoreService.js';
export * as inventoryService from './services/inventoryService.js';
export * as openaiService from './services/openaiService.js';
export * as telegramService from './services/telegramService.js';

// Re-export utilities
export * as commandParser from './utils/commandParser.js';
export * as dateResolver from './utils/dateResolver.js';

// Re-export types
export * from './types/index.js';
