import type { RestaurantStore } from '../db/store';
import { ReconcileError } from '../errors';
import { silentLogger } from '../logger';
import type { Logger } from '../logger';
import type { ReconcileResult, RestaurantRecord } from '../types';
import { recordToRestaurantInput } from './scraping/normalize';

/**
 * Upsert one record keyed by exact address: update the first restaurant at
 * that address, or create one. Two runs racing on the same new address can
 * both create; the store does not prevent it.
 */
export async function reconcileRestaurant(
  store: RestaurantStore,
  record: RestaurantRecord,
  logger: Logger = silentLogger,
): Promise<ReconcileResult> {
  const fields = recordToRestaurantInput(record);
  const existing = await store.findRestaurantByAddress(record.address);
  if (existing) {
    logger.info({ id: existing.id, name: record.name, address: record.address }, 'Updating existing restaurant');
    const updated = await store.updateRestaurant(existing.id, fields);
    if (!updated) {
      throw new ReconcileError(`Restaurant ${existing.id} disappeared before it could be updated`, record.address);
    }
    return { action: 'updated', restaurant: updated };
  }
  logger.info({ name: record.name, address: record.address }, 'Creating new restaurant');
  return { action: 'created', restaurant: await store.createRestaurant(fields) };
}

/** Reconcile records one at a time; the first failure rejects. */
export async function reconcileRestaurants(
  store: RestaurantStore,
  records: RestaurantRecord[],
  logger: Logger = silentLogger,
): Promise<ReconcileResult[]> {
  const results: ReconcileResult[] = [];
  for (const record of records) {
    results.push(await reconcileRestaurant(store, record, logger));
  }
  return results;
}
