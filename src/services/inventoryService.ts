import { Firestore } from '@google-cloud/firestore';
import { z } from 'zod';
import { getConfig } from '../config/index.js';
import { timestampInZone } from '../utils/dateResolver.js';
import type { InventoryIssue, InventoryLine, InventoryLoss } from '../types/index.js';

const config = getConfig();
const firestore = new Firestore();

export const DEFAULT_QUALITY = 'regular';

export const ISSUE_NOT_IN_INVENTORY = 'no existe en inventario';
export const ISSUE_INSUFFICIENT_STOCK = 'no hay suficiente inventario';

const SynonymSchema = z.object({
  alias: z.string(),
  item: z.string(),
  quality: z.string().optional()
});

const StockSchema = z.object({
  quantity: z.coerce.number()
});

function getInventoryCollection() {
  return firestore.collection(config.firestore.inventoryCollection);
}

/**
 * Document id for an item/quality pair.
 */
export function inventoryDocId(item: string, quality: string): string {
  return `${item.trim().toLowerCase()}_${quality.trim().toLowerCase()}`;
}

function readQuantity(data: unknown): number {
  const parsed = StockSchema.safeParse(data);
  return parsed.success && Number.isFinite(parsed.data.quantity) ? parsed.data.quantity : 0;
}

/**
 * Map an alias such as "rosas rojas" to the canonical item name.
 * A synonym may also pin the quality.
 */
export async function resolveSynonym(
  item: string,
  quality: string
): Promise<{ item: string; quality: string }> {
  const snapshot = await firestore.collection(config.firestore.synonymsCollection).get();
  const normalizedItem = item.trim().toLowerCase();

  for (const doc of snapshot.docs) {
    const parsed = SynonymSchema.safeParse(doc.data());
    if (parsed.success && parsed.data.alias.trim().toLowerCase() === normalizedItem) {
      return { item: parsed.data.item, quality: parsed.data.quality ?? quality };
    }
  }

  return { item, quality };
}

/**
 * Deduct sold or lost units from stock.
 *
 * Lines for items that are not stocked are reported and skipped. Lines that
 * ask for more than is in stock are reported and the stock drops to zero.
 * Every issue is also stored in the issues collection.
 */
export async function deductInventory(
  lines: InventoryLine[],
  transactionId: string
): Promise<InventoryIssue[]> {
  const issues: InventoryIssue[] = [];

  for (const line of lines) {
    const { item, quality } = await resolveSynonym(line.item, line.quality || DEFAULT_QUALITY);
    const quantity = line.quantity ?? 0;
    const docRef = getInventoryCollection().doc(inventoryDocId(item, quality));

    const reason = await firestore.runTransaction(async (transaction) => {
      const doc = await transaction.get(docRef);

      if (!doc.exists) {
        return ISSUE_NOT_IN_INVENTORY;
      }

      const current = readQuantity(doc.data());
      transaction.set(docRef, { quantity: Math.max(0, current - quantity) }, { merge: true });

      return current < quantity ? ISSUE_INSUFFICIENT_STOCK : null;
    });

    if (reason) {
      issues.push({
        timestamp: timestampInZone(config.timezone),
        transaction_id: transactionId,
        item,
        quality,
        requested_qty: quantity,
        reason
      });
    }
  }

  for (const issue of issues) {
    await firestore.collection(config.firestore.issuesCollection).add(issue);
  }

  if (issues.length > 0) {
    console.warn(`Inventory issues for transaction ${transactionId}: ${issues.length}`);
  }

  return issues;
}

/**
 * Set the absolute stock count of an item.
 */
export async function setInventory(item: string, quality: string, quantity: number): Promise<void> {
  const resolved = await resolveSynonym(item, quality);
  await getInventoryCollection()
    .doc(inventoryDocId(resolved.item, resolved.quality))
    .set({ item: resolved.item, quality: resolved.quality, quantity }, { merge: true });
}

/**
 * Put units back into stock, creating the item when it is not stocked yet.
 */
export async function restoreInventory(item: string, quality: string, quantity: number): Promise<void> {
  const resolved = await resolveSynonym(item, quality);
  const docRef = getInventoryCollection().doc(inventoryDocId(resolved.item, resolved.quality));

  await firestore.runTransaction(async (transaction) => {
    const doc = await transaction.get(docRef);

    if (doc.exists) {
      const current = readQuantity(doc.data());
      transaction.set(docRef, { quantity: Math.max(0, current + quantity) }, { merge: true });
    } else {
      transaction.set(docRef, { item: resolved.item, quality: resolved.quality, quantity }, { merge: true });
    }
  });
}

/**
 * Restock the lines of a transaction that is being deleted or replaced.
 */
export async function restoreLines(lines: InventoryLine[]): Promise<void> {
  for (const line of lines) {
    const quantity = line.quantity ?? 0;
    if (quantity <= 0) {
      continue;
    }
    await restoreInventory(line.item, line.quality || DEFAULT_QUALITY, quantity);
  }
}

/**
 * Store a loss (spoiled or discarded units).
 */
export async function recordLoss(loss: InventoryLoss): Promise<void> {
  await firestore.collection(config.firestore.lossesCollection).add(loss);
}
