import type { ShoeStore } from '../../application/inventory/shoeStore.js';
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
import type { Database } from './database.js';

interface ShoeRow {
  id: number;
  user_id: number;
  brand: string;
  model: string;
  colorway: string;
  size: number;
  price: number;
  image: string | null;
  condition: string;
}

const SHOE_COLUMNS = 'id, user_id, brand, model, colorway, size, price, image, condition';

// Column names come from this fixed map, never from input.
const COLUMN_BY_FIELD: Record<ShoeField, string> = {
  brand: 'brand',
  model: 'model',
  colorway: 'colorway',
  size: 'size',
  price: 'price',
  image: 'image',
  condition: 'condition',
};

function toShoe(row: ShoeRow): Shoe {
  return {
    id: row.id,
    userId: row.user_id,
    brand: row.brand,
    model: row.model,
    colorway: row.colorway,
    size: Number(row.size),
    price: Number(row.price),
    image: row.image,
    condition: row.condition,
  };
}

export class ShoeRepo implements ShoeStore {
  constructor(private db: Database) {}

  async countBrands(ownerId: UserId, limit: number): Promise<BrandCount[]> {
    const result = await this.db.query<{ brand: string; quantity: number }>(
      `SELECT brand, COUNT(*)::int AS quantity
       FROM shoes
       WHERE user_id = $1
       GROUP BY brand
       ORDER BY quantity DESC, brand ASC
       LIMIT $2`,
      [ownerId, limit]
    );

    return result.rows.map((row) => ({ brand: row.brand, count: row.quantity }));
  }

  async countModels(ownerId: UserId, brand: string, limit: number): Promise<ModelCount[]> {
    const result = await this.db.query<{ model: string; quantity: number }>(
      `SELECT model, COUNT(*)::int AS quantity
       FROM shoes
       WHERE user_id = $1 AND brand = $2
       GROUP BY model
       ORDER BY quantity DESC, model ASC
       LIMIT $3`,
      [ownerId, brand, limit]
    );

    return result.rows.map((row) => ({ model: row.model, count: row.quantity }));
  }

  async countVariants(
    ownerId: UserId,
    brand: string,
    model: string,
    limit: number
  ): Promise<VariantCount[]> {
    const result = await this.db.query<{
      colorway: string;
      size: number;
      condition: string;
      quantity: number;
    }>(
      `SELECT colorway, size, condition, COUNT(*)::int AS quantity
       FROM shoes
       WHERE user_id = $1 AND brand = $2 AND model = $3
       GROUP BY colorway, size, condition
       ORDER BY quantity DESC, colorway ASC, size ASC, condition ASC
       LIMIT $4`,
      [ownerId, brand, model, limit]
    );

    return result.rows.map((row) => ({
      colorway: row.colorway,
      size: Number(row.size),
      condition: row.condition,
      count: row.quantity,
    }));
  }

  async findRepresentative(ownerId: UserId, criteria: VariantCriteria): Promise<Shoe | null> {
    const result = await this.db.query<ShoeRow>(
      `SELECT ${SHOE_COLUMNS}
       FROM shoes
       WHERE user_id = $1
         AND brand = $2
         AND model = $3
         AND colorway = $4
         AND size = $5
         AND condition = $6
       ORDER BY id ASC
       LIMIT 1`,
      [ownerId, criteria.brand, criteria.model, criteria.colorway, criteria.size, criteria.condition]
    );

    const row = result.rows[0];
    return row ? toShoe(row) : null;
  }

  async summarize(ownerId: UserId): Promise<ModelSummary[]> {
    const result = await this.db.query<{ brand: string; model: string; quantity: number }>(
      `SELECT brand, model, COUNT(*)::int AS quantity
       FROM shoes
       WHERE user_id = $1
       GROUP BY brand, model
       ORDER BY quantity DESC, brand ASC, model ASC`,
      [ownerId]
    );

    return result.rows.map((row) => ({ brand: row.brand, model: row.model, count: row.quantity }));
  }

  async insert(ownerId: UserId, attributes: ShoeAttributes): Promise<Shoe> {
    return this.db.transaction(async (tx) => {
      const result = await tx.query<ShoeRow>(
        `INSERT INTO shoes (user_id, brand, model, colorway, size, price, image, condition)
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
         RETURNING ${SHOE_COLUMNS}`,
        [
          ownerId,
          attributes.brand,
          attributes.model,
          attributes.colorway,
          attributes.size,
          attributes.price,
          attributes.image,
          attributes.condition,
        ]
      );
      return toShoe(result.rows[0]);
    });
  }

  async updateField<F extends ShoeField>(
    shoeId: ShoeId,
    field: F,
    value: ShoeAttributes[F]
  ): Promise<number> {
    const column = COLUMN_BY_FIELD[field];
    return this.db.transaction(async (tx) => {
      const result = await tx.query(`UPDATE shoes SET ${column} = $1 WHERE id = $2`, [value, shoeId]);
      return result.rowCount ?? 0;
    });
  }

  async delete(shoeId: ShoeId): Promise<number> {
    return this.db.transaction(async (tx) => {
      const result = await tx.query('DELETE FROM shoes WHERE id = $1', [shoeId]);
      return result.rowCount ?? 0;
    });
  }
}
