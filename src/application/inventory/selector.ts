import {
  toResolvedShoe,
  type BrandCount,
  type ModelCount,
  type ResolvedShoe,
  type Shoe,
  type UserId,
  type VariantCount,
} from '../../domain/inventory/shoe.js';
import type { InputResult } from '../../domain/inventory/fields.js';
import { StorageError } from '../errors.js';
import type { ShoeStore } from './shoeStore.js';

export const BRAND_LIMIT = 20;
export const MODEL_LIMIT = 20;
export const VARIANT_LIMIT = 50;

/**
 * Result of feeding one input line to a funnel stage.
 */
export type StageResult<T> = InputResult<T>;

export interface NotFound {
  kind: 'not-found';
  reason: string;
}

export type Resolution =
  | { kind: 'resolved'; shoe: ResolvedShoe; record: Shoe }
  | NotFound
  | { kind: 'cancelled' };

export interface BrandStage {
  kind: 'brands';
  brands: BrandCount[];
}

export interface ModelStage {
  brand: string;
  models: ModelCount[];
}

export interface VariantStage {
  brand: string;
  model: string;
  variants: VariantCount[];
}

export interface SelectedVariant extends VariantStage {
  variant: VariantCount;
}

function retry<T>(reason: string): StageResult<T> {
  return { kind: 'retry', reason };
}

function databaseRetry<T>(error: StorageError): StageResult<T> {
  return retry(`❌ Database error: ${error.message}. Please try again.`);
}

/**
 * Drill-down funnel that narrows an owner's collection to one shoe:
 * brand → model → variant → representative record.
 *
 * Every stage works on grouped counts ordered most-common first with a
 * lexical tie-break, so identical data always yields identical menus.
 * The stages hold no I/O of their own; the caller owns the prompt loop.
 */
export class ShoeSelector {
  constructor(private store: ShoeStore) {}

  /**
   * Stage 1. An empty collection ends the funnel here.
   */
  async openBrands(ownerId: UserId): Promise<BrandStage | NotFound> {
    let brands: BrandCount[];
    try {
      brands = await this.store.countBrands(ownerId, BRAND_LIMIT);
    } catch (error) {
      if (error instanceof StorageError) {
        return { kind: 'not-found', reason: `Unable to retrieve shoes: ${error.message}` };
      }
      throw error;
    }

    if (brands.length === 0) {
      return { kind: 'not-found', reason: 'No shoes found in the database' };
    }
    return { kind: 'brands', brands };
  }

  /**
   * Stage 2. A brand is accepted when it has at least one model.
   */
  async selectBrand(ownerId: UserId, input: string): Promise<StageResult<ModelStage>> {
    const brand = input.trim();
    let models: ModelCount[];
    try {
      models = await this.store.countModels(ownerId, brand, MODEL_LIMIT);
    } catch (error) {
      if (error instanceof StorageError) {
        return databaseRetry(error);
      }
      throw error;
    }

    if (models.length === 0) {
      return retry('Error: Please select a valid brand');
    }
    return { kind: 'valid', value: { brand, models } };
  }

  /**
   * Stage 3. A model is accepted when it has at least one variant.
   */
  async selectModel(ownerId: UserId, brand: string, input: string): Promise<StageResult<VariantStage>> {
    const model = input.trim();
    let variants: VariantCount[];
    try {
      variants = await this.store.countVariants(ownerId, brand, model, VARIANT_LIMIT);
    } catch (error) {
      if (error instanceof StorageError) {
        return databaseRetry(error);
      }
      throw error;
    }

    if (variants.length === 0) {
      return retry('Error: Please select a valid model');
    }
    return { kind: 'valid', value: { brand, model, variants } };
  }

  /**
   * Variants are numbered from 1; anything but an in-range integer retries.
   */
  selectVariant(stage: VariantStage, input: string): StageResult<SelectedVariant> {
    const text = input.trim();
    const index = /^\d+$/.test(text) ? Number(text) : 0;
    const variant = index > 0 ? stage.variants[index - 1] : undefined;
    if (!variant) {
      return retry('Error: Please select a valid variant');
    }
    return { kind: 'valid', value: { ...stage, variant } };
  }

  /**
   * Stage 4. Picks the lowest-id record among duplicates of the variant.
   */
  async resolveVariant(ownerId: UserId, selection: SelectedVariant): Promise<Resolution> {
    try {
      const shoe = await this.store.findRepresentative(ownerId, {
        brand: selection.brand,
        model: selection.model,
        colorway: selection.variant.colorway,
        size: selection.variant.size,
        condition: selection.variant.condition,
      });
      if (!shoe) {
        return { kind: 'not-found', reason: 'No shoe found with the given criteria' };
      }
      return { kind: 'resolved', shoe: toResolvedShoe(shoe), record: shoe };
    } catch (error) {
      if (error instanceof StorageError) {
        return { kind: 'not-found', reason: `Unable to retrieve shoe: ${error.message}` };
      }
      throw error;
    }
  }
}
