import {
  pairLabel,
  type ModelSummary,
  type ResolvedShoe,
  type VariantCount,
} from '../../domain/inventory/shoe.js';

export function formatPrice(price: number): string {
  return `$${price.toFixed(2)}`;
}

/** "Nike, 2 Pairs of Shoes" */
export function formatCountLine(name: string, count: number): string {
  return `${name}, ${count} ${pairLabel(count)} of Shoes`;
}

export function formatVariantLine(position: number, model: string, variant: VariantCount): string {
  return `${position}. ${model}, ${variant.colorway}, ${variant.size}, ${variant.condition}, ${variant.count} ${pairLabel(variant.count)} of Shoes`;
}

export function formatShoeDetails(shoe: ResolvedShoe): string {
  return `Shoe Details: ${shoe.brand}, ${shoe.model}, ${shoe.colorway}, ${shoe.size}, ${formatPrice(shoe.price)}, ${shoe.image}, ${shoe.condition}`;
}

export function formatSummary(rows: ModelSummary[]): string[] {
  if (rows.length === 0) {
    return ['No shoes found in the database'];
  }
  return [' brand | model | quantity', ...rows.map((row) => `${row.brand} | ${row.model} | ${row.count}`)];
}
