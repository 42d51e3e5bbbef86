import { z } from 'zod';
import type { ShoeAttributes } from './shoe.js';

export const shoeCatalogSchema = z.object({
  conditions: z.array(z.string().min(1)).min(1),
  sizes: z.array(z.number().positive()).min(1),
  brands: z
    .array(
      z.object({
        brand: z.string().min(1),
        priceRange: z.tuple([z.number().positive(), z.number().positive()]),
        models: z
          .array(
            z.object({
              model: z.string().min(1),
              colorways: z.array(z.string().min(1)).min(1),
            })
          )
          .min(1),
      })
    )
    .min(1),
});

export type ShoeCatalog = z.infer<typeof shoeCatalogSchema>;

/** Uniform in [0, 1), like Math.random. */
export type RandomSource = () => number;

export function pick<T>(items: readonly T[], random: RandomSource): T {
  const item = items[Math.floor(random() * items.length)];
  if (item === undefined) {
    throw new Error('Cannot pick from an empty list');
  }
  return item;
}

/** nike_air_max_90_black_white.jpg */
export function imageFilename(brand: string, model: string, colorway: string): string {
  const slug = (text: string) => text.toLowerCase().replace(/[\s/]+/g, '_');
  return `${slug(brand)}_${slug(model)}_${slug(colorway)}.jpg`;
}

export function generateShoe(catalog: ShoeCatalog, random: RandomSource): ShoeAttributes {
  const entry = pick(catalog.brands, random);
  const { model, colorways } = pick(entry.models, random);
  const colorway = pick(colorways, random);
  const [minPrice, maxPrice] = entry.priceRange;

  return {
    brand: entry.brand,
    model,
    colorway,
    size: pick(catalog.sizes, random),
    price: Math.round((minPrice + random() * (maxPrice - minPrice)) * 100) / 100,
    image: imageFilename(entry.brand, model, colorway),
    condition: pick(catalog.conditions, random),
  };
}

export interface CollectionOptions {
  total: number;
  duplicatePairs: number;
}

/**
 * `total` random shoes, `duplicatePairs` of which appear twice with
 * identical attributes, in shuffled order.
 */
export function generateCollection(
  catalog: ShoeCatalog,
  random: RandomSource,
  { total, duplicatePairs }: CollectionOptions = { total: 20, duplicatePairs: 2 }
): ShoeAttributes[] {
  if (duplicatePairs * 2 > total) {
    throw new Error(`Cannot fit ${duplicatePairs} duplicate pairs into ${total} shoes`);
  }

  const shoes: ShoeAttributes[] = [];
  for (let i = 0; i < duplicatePairs; i++) {
    const shoe = generateShoe(catalog, random);
    shoes.push(shoe, { ...shoe });
  }
  while (shoes.length < total) {
    shoes.push(generateShoe(catalog, random));
  }

  // Fisher-Yates
  for (let i = shoes.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [shoes[i], shoes[j]] = [shoes[j], shoes[i]];
  }
  return shoes;
}
