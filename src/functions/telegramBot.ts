import type { Request, Response } from '@google-cloud/functions-framework';
import { Telegraf } from 'telegraf';
import { message } from 'telegraf/filters';
import type { Update } from 'telegraf/types';
import { z } from 'zod';
import { getConfig, getTelegramToken } from '../config/index.js';
import { claimUpdate, loadAllowedUserIds, loadBotConfig } from '../services/firestoreService.js';
import { handleStart, handleTextMessage, type BotSession } from '../handlers/messageHandlers.js';

const UpdateEnvelopeSchema = z.object({
  update_id: z.number().int()
});

// Telegraf dispatches on the payload itself; only the envelope is checked here
const UpdateSchema = z.custom<Update>(
  (value) => UpdateEnvelopeSchema.safeParse(value).success,
  'Invalid update'
);

/**
 * The parts of the HTTP request and response the webhook handler uses.
 */
export interface WebhookRequest {
  method: string;
  body: unknown;
  get(name: string): string | undefined;
}

export interface WebhookResponse {
  status(code: number): { send(body: string): unknown };
}

/**
 * Display name of a Telegram user.
 */
export function fullName(user: { first_name: string; last_name?: string }): string {
  return [user.first_name, user.last_name].filter(Boolean).join(' ');
}

/**
 * Build a bot whose handlers share the given session.
 */
export function createBot(token: string, buildSession: (bot: Telegraf) => BotSession): Telegraf {
  const bot = new Telegraf(token);
  const session = buildSession(bot);

  bot.start(async (ctx) => {
    await handleStart(session, ctx.message.chat.id);
  });

  bot.on(message('text'), async (ctx) => {
    const from = ctx.message.from;
    if (!from) {
      return;
    }
    await handleTextMessage(session, {
      chatId: ctx.message.chat.id,
      userId: from.id,
      fullName: fullName(from),
      text: ctx.message.text
    });
  });

  bot.catch((error) => {
    console.error('Unhandled error while processing update:', error);
  });

  return bot;
}

/**
 * Cloud Function receiving Telegram webhook calls.
 */
export async function telegramBot(req: Request, res: Response): Promise<void> {
  await handleWebhook(req, res);
}

/**
 * GET registers the webhook for the host the function is served from.
 * POST processes one update.
 */
export async function handleWebhook(req: WebhookRequest, res: WebhookResponse): Promise<void> {
  const config = getConfig();

  if (req.method === 'GET') {
    await registerWebhook(req, res);
    return;
  }

  if (req.method !== 'POST') {
    res.status(405).send('Method not allowed');
    return;
  }

  const envelope = UpdateSchema.safeParse(req.body);
  if (!envelope.success) {
    console.warn('Rejected request without a valid update_id');
    res.status(400).send('Invalid update');
    return;
  }

  const updateId = envelope.data.update_id;

  try {
    const firstDelivery = await claimUpdate(updateId);
    if (!firstDelivery) {
      console.log(`Duplicate update received: ${updateId}`);
      res.status(200).send('ok');
      return;
    }

    const [allowedUsers, botConfig] = await Promise.all([loadAllowedUserIds(), loadBotConfig()]);

    const bot = createBot(getTelegramToken(), (created) => ({
      sender: created.telegram,
      allowedUsers,
      config: botConfig,
      timezone: config.timezone
    }));

    await bot.handleUpdate(envelope.data);
  } catch (error) {
    // Answer 200 anyway: the update is already claimed, a redelivery would be dropped
    console.error(`Error processing update ${updateId}:`, error);
  }

  res.status(200).send('ok');
}

async function registerWebhook(req: WebhookRequest, res: WebhookResponse): Promise<void> {
  const host = req.get('host');
  if (!host) {
    res.status(400).send('Missing host header');
    return;
  }

  const webhookUrl = `https://${host}${getConfig().telegram.webhookPath}`;

  try {
    const bot = new Telegraf(getTelegramToken());
    await bot.telegram.setWebhook(webhookUrl);
    console.log(`Webhook set to ${webhookUrl}`);
    res.status(200).send('Webhook set');
  } catch (error) {
    console.error('Error setting webhook:', error);
    res.status(500).send('Failed to set webhook');
  }
}
