import type { ShoeStore } from '../application/inventory/shoeStore.js';
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
} from '../domain/inventory/shoe.js';

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function countBy<K>(shoes: Shoe[], keyOf: (shoe: Shoe) => K): Array<{ key: K; count: number }> {
  const groups = new Map<string, { key: K; count: number }>();
  for (const shoe of shoes) {
    const key = keyOf(shoe);
    const id = JSON.stringify(key);
    const group = groups.get(id);
    if (group) {
      group.count++;
    } else {
      groups.set(id, { key, count: 1 });
    }
  }
  return [...groups.values()];
}

/**
 * ShoeStore over an array, with the same grouping and ordering rules as
 * the SQL in ShoeRepo. Records every call and can fail one on demand.
 */
export class InMemoryShoeStore implements ShoeStore {
  readonly calls: string[] = [];
  private shoes: Shoe[] = [];
  private nextId = 1;
  private failures = new Map<keyof ShoeStore, unknown>();

  seed(ownerId: UserId, attributes: ShoeAttributes): Shoe {
    const shoe: Shoe = { id: this.nextId++, userId: ownerId, ...attributes };
    this.shoes.push(shoe);
    return shoe;
  }

  all(): Shoe[] {
    return this.shoes.map((shoe) => ({ ...shoe }));
  }

  /** What ON DELETE CASCADE does when the owner row goes. */
  removeOwner(ownerId: UserId): void {
    this.shoes = this.shoes.filter((shoe) => shoe.userId !== ownerId);
  }

  /** The next call to `method` throws `error`. */
  failNext(method: keyof ShoeStore, error: unknown): void {
    this.failures.set(method, error);
  }

  private enter(method: keyof ShoeStore): void {
    this.calls.push(method);
    if (this.failures.has(method)) {
      const error = this.failures.get(method);
      this.failures.delete(method);
      throw error;
    }
  }

  private owned(ownerId: UserId): Shoe[] {
    return this.shoes.filter((shoe) => shoe.userId === ownerId);
  }

  async countBrands(ownerId: UserId, limit: number): Promise<BrandCount[]> {
    this.enter('countBrands');
    return countBy(this.owned(ownerId), (shoe) => shoe.brand)
      .map(({ key, count }) => ({ brand: key, count }))
      .sort((a, b) => b.count - a.count || compareText(a.brand, b.brand))
      .slice(0, limit);
  }

  async countModels(ownerId: UserId, brand: string, limit: number): Promise<ModelCount[]> {
    this.enter('countModels');
    const shoes = this.owned(ownerId).filter((shoe) => shoe.brand === brand);
    return countBy(shoes, (shoe) => shoe.model)
      .map(({ key, count }) => ({ model: key, count }))
      .sort((a, b) => b.count - a.count || compareText(a.model, b.model))
      .slice(0, limit);
  }

  async countVariants(
    ownerId: UserId,
    brand: string,
    model: string,
    limit: number
  ): Promise<VariantCount[]> {
    this.enter('countVariants');
    const shoes = this.owned(ownerId).filter((shoe) => shoe.brand === brand && shoe.model === model);
    return countBy(shoes, (shoe) => ({
      colorway: shoe.colorway,
      size: shoe.size,
      condition: shoe.condition,
    }))
      .map(({ key, count }) => ({ ...key, count }))
      .sort(
        (a, b) =>
          b.count - a.count ||
          compareText(a.colorway, b.colorway) ||
          a.size - b.size ||
          compareText(a.condition, b.condition)
      )
      .slice(0, limit);
  }

  async findRepresentative(ownerId: UserId, criteria: VariantCriteria): Promise<Shoe | null> {
    this.enter('findRepresentative');
    const match = this.owned(ownerId)
      .filter(
        (shoe) =>
          shoe.brand === criteria.brand &&
          shoe.model === criteria.model &&
          shoe.colorway === criteria.colorway &&
          shoe.size === criteria.size &&
          shoe.condition === criteria.condition
      )
      .sort((a, b) => a.id - b.id)[0];
    return match ? { ...match } : null;
  }

  async summarize(ownerId: UserId): Promise<ModelSummary[]> {
    this.enter('summarize');
    return countBy(this.owned(ownerId), (shoe) => ({ brand: shoe.brand, model: shoe.model }))
      .map(({ key, count }) => ({ ...key, count }))
      .sort((a, b) => b.count - a.count || compareText(a.brand, b.brand) || compareText(a.model, b.model));
  }

  async insert(ownerId: UserId, attributes: ShoeAttributes): Promise<Shoe> {
    this.enter('insert');
    return { ...this.seed(ownerId, attributes) };
  }

  async updateField<F extends ShoeField>(
    shoeId: ShoeId,
    field: F,
    value: ShoeAttributes[F]
  ): Promise<number> {
    this.enter('updateField');
    const index = this.shoes.findIndex((candidate) => candidate.id === shoeId);
    if (index === -1) {
      return 0;
    }
    const attributes: ShoeAttributes = { ...this.shoes[index] };
    attributes[field] = value;
    this.shoes[index] = { ...this.shoes[index], ...attributes };
    return 1;
  }

  async delete(shoeId: ShoeId): Promise<number> {
    this.enter('delete');
    const before = this.shoes.length;
    this.shoes = this.shoes.filter((shoe) => shoe.id !== shoeId);
    return before - this.shoes.length;
  }
}
