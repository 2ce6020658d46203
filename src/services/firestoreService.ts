import { Firestore, FieldValue } from '@google-cloud/firestore';
import { addDays } from 'date-fns';
import { getConfig } from '../config/index.js';
import { AllowedUserSchema, BotConfigSchema } from '../schemas/configSchema.js';
import { ConfigurationError } from '../utils/errors.js';
import type { BotConfig } from '../types/index.js';

const config = getConfig();
const firestore = new Firestore();

// gRPC status returned by create() when the document already exists
const ALREADY_EXISTS = 6;

/**
 * Load the Telegram ids allowed to use the bot.
 */
export async function loadAllowedUserIds(): Promise<Set<number>> {
  const snapshot = await firestore.collection(config.firestore.allowedUsersCollection).get();
  const allowedUsers = new Set<number>();

  for (const doc of snapshot.docs) {
    const parsed = AllowedUserSchema.safeParse(doc.data());
    if (!parsed.success) {
      console.warn(`Skipping allowed user document ${doc.id}: invalid ID`);
      continue;
    }
    allowedUsers.add(parsed.data.ID);
  }

  return allowedUsers;
}

/**
 * Load the runtime bot settings document.
 */
export async function loadBotConfig(): Promise<BotConfig> {
  const doc = await firestore
    .collection(config.firestore.configCollection)
    .doc(config.firestore.configDocument)
    .get();

  if (!doc.exists) {
    throw new ConfigurationError('Config document not found in Firestore.');
  }

  const parsed = BotConfigSchema.safeParse(doc.data());
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid bot config document: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Record a webhook update as processed.
 * Returns false when the update was already claimed by an earlier delivery.
 * `expiresAt` is the field a Firestore TTL policy on the collection deletes by.
 */
export async function claimUpdate(updateId: number): Promise<boolean> {
  try {
    await firestore
      .collection(config.firestore.processedUpdatesCollection)
      .doc(String(updateId))
      .create({
        processedAt: FieldValue.serverTimestamp(),
        expiresAt: addDays(new Date(), config.firestore.processedUpdatesTtlDays)
      });
    return true;
  } catch (error) {
    if (isAlreadyExists(error)) {
      return false;
    }
    throw error;
  }
}

function isAlreadyExists(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === ALREADY_EXISTS;
}
