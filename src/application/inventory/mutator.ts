import {
  normalizeImage,
  type Shoe,
  type ShoeAttributes,
  type ShoeField,
  type ShoeId,
  type UserId,
} from '../../domain/inventory/shoe.js';
import type { ShoeStore } from './shoeStore.js';

/**
 * `applied: false` means no row matched the id; nothing was written.
 */
export interface MutationOutcome {
  applied: boolean;
}

type FieldNormalizers = { [F in ShoeField]?: (value: ShoeAttributes[F]) => ShoeAttributes[F] };

const fieldNormalizers: FieldNormalizers = {
  image: normalizeImage,
};

/**
 * Single-row writes on a resolved shoe. Values arrive already validated
 * by the prompt layer; each call commits or rolls back on its own.
 */
export class ShoeMutator {
  constructor(private store: ShoeStore) {}

  async add(ownerId: UserId, attributes: ShoeAttributes): Promise<Shoe> {
    return this.store.insert(ownerId, {
      ...attributes,
      image: normalizeImage(attributes.image),
    });
  }

  async updateField<F extends ShoeField>(
    shoeId: ShoeId,
    field: F,
    value: ShoeAttributes[F]
  ): Promise<MutationOutcome> {
    const normalize: ((value: ShoeAttributes[F]) => ShoeAttributes[F]) | undefined =
      fieldNormalizers[field];
    const affected = await this.store.updateField(shoeId, field, normalize ? normalize(value) : value);
    return { applied: affected > 0 };
  }

  async delete(shoeId: ShoeId): Promise<MutationOutcome> {
    const affected = await this.store.delete(shoeId);
    return { applied: affected > 0 };
  }
}
