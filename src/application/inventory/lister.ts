import type { ModelSummary, UserId } from '../../domain/inventory/shoe.js';
import type { ShoeStore } from './shoeStore.js';

export class InventoryQueries {
  constructor(private store: ShoeStore) {}

  /**
   * (brand, model, count) for every model the owner holds,
   * by count desc, then brand and model asc.
   */
  async listGrouped(ownerId: UserId): Promise<ModelSummary[]> {
    return this.store.summarize(ownerId);
  }
}
