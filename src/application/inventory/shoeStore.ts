import type {
  BrandCount,
  ModelCount,
  ModelSummary,
  Shoe,
  ShoeAttributes,
  ShoeField,
  ShoeId,
  UserId,
  VariantCount,
  VariantCriteria,
} from '../../domain/inventory/shoe.js';

/**
 * Persistence port for shoe records. Every query is scoped to one owner;
 * writes commit on their own and throw StorageError subclasses on failure.
 */
export interface ShoeStore {
  /** Brands by count desc, brand asc. */
  countBrands(ownerId: UserId, limit: number): Promise<BrandCount[]>;
  /** Models of one brand by count desc, model asc. */
  countModels(ownerId: UserId, brand: string, limit: number): Promise<ModelCount[]>;
  /** Variants by count desc, then colorway, size, condition asc. */
  countVariants(ownerId: UserId, brand: string, model: string, limit: number): Promise<VariantCount[]>;
  /** Lowest-id shoe matching every criterion, if any. */
  findRepresentative(ownerId: UserId, criteria: VariantCriteria): Promise<Shoe | null>;
  summarize(ownerId: UserId): Promise<ModelSummary[]>;

  insert(ownerId: UserId, attributes: ShoeAttributes): Promise<Shoe>;
  /** Returns the number of rows changed. */
  updateField<F extends ShoeField>(shoeId: ShoeId, field: F, value: ShoeAttributes[F]): Promise<number>;
  /** Returns the number of rows removed. */
  delete(shoeId: ShoeId): Promise<number>;
}
