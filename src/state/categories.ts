/**
 * Waste category reference data (read-only)
 */

import { z } from 'zod';
import rawCategories from '../data/wasteCategories.json';
import { WASTE_TYPES, type WasteCategory, type WasteType } from './types';

const categorySchema = z.object({
  name: z.enum(WASTE_TYPES),
  label: z.string().min(1).max(100),
  colorCode: z.string().startsWith('#').max(7).nullable().default(null),
  icon: z.string().max(50).nullable().default(null),
  basePoints: z.number().int().min(0),
  environmentalMultiplier: z.number().min(0).optional(),
});

export type CategoryLookup = (type: WasteType) => WasteCategory;

function buildIndex(entries: unknown): ReadonlyMap<WasteType, WasteCategory> {
  const parsed = z.array(categorySchema).parse(entries);
  const index = new Map<WasteType, WasteCategory>();
  for (const c of parsed) index.set(c.name, Object.freeze({ ...c }));
  return index;
}

const DEFAULT_CATEGORIES = buildIndex(rawCategories);

function fallbackCategory(type: WasteType): WasteCategory {
  return { name: type, label: type, colorCode: null, icon: null, basePoints: 1 };
}

export function listCategories(): WasteCategory[] {
  return WASTE_TYPES.map(getCategory);
}

export function getCategory(type: WasteType): WasteCategory {
  return DEFAULT_CATEGORIES.get(type) ?? fallbackCategory(type);
}

/**
 * Build a lookup from category data served by the backend; types it does not
 * mention fall back to the bundled reference data.
 */
export function createCategoryLookup(entries: unknown): CategoryLookup {
  const index = buildIndex(entries);
  return (type) => index.get(type) ?? getCategory(type);
}
