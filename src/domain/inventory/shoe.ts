/**
 * Shoe domain types.
 * A shoe is one physical pair; two shoes may share every visible attribute,
 * so identity is the surrogate id only.
 */
export type UserId = number;
export type ShoeId = number;

export interface ShoeAttributes {
  brand: string;
  model: string;
  colorway: string;
  size: number;
  price: number;
  image: string | null;
  condition: string;
}

export interface Shoe extends ShoeAttributes {
  readonly id: ShoeId;
  readonly userId: UserId;
}

export const SHOE_FIELDS = [
  'brand',
  'model',
  'colorway',
  'size',
  'price',
  'image',
  'condition',
] as const satisfies readonly (keyof ShoeAttributes)[];

export type ShoeField = (typeof SHOE_FIELDS)[number];

export interface BrandCount {
  brand: string;
  count: number;
}

export interface ModelCount {
  model: string;
  count: number;
}

/**
 * A (colorway, size, condition) triple inside one brand + model grouping.
 */
export interface VariantKey {
  colorway: string;
  size: number;
  condition: string;
}

export interface VariantCount extends VariantKey {
  count: number;
}

export interface VariantCriteria extends VariantKey {
  brand: string;
  model: string;
}

export interface ModelSummary {
  brand: string;
  model: string;
  count: number;
}

export const NO_IMAGE = 'No image available';

/**
 * A shoe picked by the selection funnel, with the image resolved for display.
 */
export interface ResolvedShoe {
  readonly id: ShoeId;
  readonly brand: string;
  readonly model: string;
  readonly colorway: string;
  readonly size: number;
  readonly price: number;
  readonly image: string;
  readonly condition: string;
}

export function toResolvedShoe(shoe: Shoe): ResolvedShoe {
  return {
    id: shoe.id,
    brand: shoe.brand,
    model: shoe.model,
    colorway: shoe.colorway,
    size: shoe.size,
    price: shoe.price,
    image: shoe.image ? shoe.image : NO_IMAGE,
    condition: shoe.condition,
  };
}

/**
 * Empty image input means "no image".
 */
export function normalizeImage(image: string | null): string | null {
  return image ? image : null;
}

export function pairLabel(count: number): string {
  return count === 1 ? 'Pair' : 'Pairs';
}
