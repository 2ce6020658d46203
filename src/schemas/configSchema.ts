import { z } from 'zod';

/**
 * Schema for config/default.json.
 */
export const AppConfigSchema = z.object({
  timezone: z.string().min(1),
  openai: z.object({
    model: z.string().min(1),
    fallbackModel: z.string().min(1),
    temperature: z.number().min(0).max(2)
  }),
  firestore: z.object({
    allowedUsersCollection: z.string().min(1),
    configCollection: z.string().min(1),
    configDocument: z.string().min(1),
    processedUpdatesCollection: z.string().min(1),
    processedUpdatesTtlDays: z.number().int().positive(),
    inventoryCollection: z.string().min(1),
    synonymsCollection: z.string().min(1),
    issuesCollection: z.string().min(1),
    lossesCollection: z.string().min(1)
  }),
  bigquery: z.object({
    auditTable: z.string().min(1)
  }),
  telegram: z.object({
    webhookPath: z.string().startsWith('/')
  })
});

// Telegram ids are stored as numbers or numeric strings depending on who edited the document
const TelegramIdSchema = z.coerce.number().int().positive();

/**
 * Runtime settings read from the bot's Firestore config document.
 */
export const BotConfigSchema = z.object({
  ownerID: TelegramIdSchema,
  developerID: TelegramIdSchema.optional(),
  liveNotifications: z.boolean().default(false),
  gptModel: z.string().min(1).optional(),
  shopName: z.string().min(1).optional()
});

/**
 * A document in the allowed users collection.
 */
export const AllowedUserSchema = z.object({
  ID: TelegramIdSchema
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type BotConfig = z.infer<typeof BotConfigSchema>;
