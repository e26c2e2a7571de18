import { HouseItemRow, PartnerRow } from '../config/datasets';
import {
  CatalogConstraints,
  CatalogMatch,
  DimensionAxis,
  Dimensions,
  Product,
  ProductSource,
} from '../types/catalog';
import { logger } from '../utils/logger';

/** Fixed mid-market rate applied once at load. A rate change needs a reload. */
export const SAR_TO_USD = 0.2667;

export const DEFAULT_TOLERANCE_CM = 10;
export const DEFAULT_RESULT_LIMIT = 10;
const MAX_RESULT_LIMIT = 50;

const SOURCE_PRIORITY: Record<ProductSource, number> = {
  'house-brand': 0,
  'partner-line': 1,
};

const AXES: DimensionAxis[] = ['width', 'height', 'depth'];

interface IndexedProduct {
  product: Product;
  searchText: string;
  attributeText: string;
  order: number;
}

export function roundCurrency(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

function parseNumber(value: string): number | null {
  const trimmed = value.trim();
  if (!trimmed || trimmed.toLowerCase().startsWith('no ')) return null;
  const parsed = Number(trimmed.replace(/,/g, ''));
  return Number.isFinite(parsed) ? parsed : null;
}

function parseBool(value: string): boolean | null {
  const normalized = value.trim().toLowerCase();
  if (['true', 'yes', 'y', '1'].includes(normalized)) return true;
  if (['false', 'no', 'n', '0'].includes(normalized)) return false;
  return null;
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export function normalizeHouseItem(row: HouseItemRow): Product {
  return {
    id: row.sku,
    name: row.name,
    source: 'house-brand',
    category: row.category,
    price: row.price_usd === undefined || row.price_usd === null ? null : roundCurrency(row.price_usd),
    currency: 'USD',
    originalPrice: null,
    dimensionsCm: { ...row.dimensions_cm },
    materials: splitList(row.material),
    colors: row.color_options.map((c) => c.trim()).filter((c) => c.length > 0),
    inStock: row.in_stock ?? null,
    link: row.link ? row.link : null,
    description: collapseWhitespace(row.description),
    designer: null,
    leadTimeDays: row.lead_time_days ?? null,
  };
}

/** Returns null for rows without an id or a name. */
export function normalizePartnerRow(row: PartnerRow): Product | null {
  const id = row.item_id.trim();
  const name = row.name.trim();
  if (!id || !name) return null;

  const priceSar = parseNumber(row.price);
  const dimensions: Dimensions = {};
  for (const axis of AXES) {
    const value = parseNumber(row[axis]);
    if (value !== null && value > 0) dimensions[axis] = value;
  }

  const otherColors = row.other_colors.trim();
  const colors = ['no', 'n/a', ''].includes(otherColors.toLowerCase()) ? [] : splitList(otherColors);

  return {
    id,
    name,
    source: 'partner-line',
    category: row.category.trim(),
    price: priceSar === null ? null : roundCurrency(priceSar * SAR_TO_USD),
    currency: 'USD',
    originalPrice: priceSar === null ? null : { amount: priceSar, currency: 'SAR' },
    dimensionsCm: dimensions,
    materials: [],
    colors,
    inStock: parseBool(row.sellable_online),
    link: row.link.trim() || null,
    description: collapseWhitespace(row.short_description),
    designer: row.designer.trim() || null,
    leadTimeDays: null,
  };
}

function tokenize(query: string | string[]): string[] {
  const text = Array.isArray(query) ? query.join(' ') : query;
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}&.-]+/u)
    .map((term) => term.replace(/^[.-]+|[.-]+$/g, ''))
    .filter((term) => term.length > 0);
}

/**
 * Read-only product index over the house-brand and partner-line sources.
 * Built once at startup; queries never mutate it.
 */
export class CatalogIndex {
  private readonly entries: IndexedProduct[];

  constructor(products: Product[]) {
    this.entries = products.map((product, order) => ({
      product: Object.freeze(product),
      searchText: [
        product.id,
        product.name,
        product.category,
        product.description,
        product.designer ?? '',
        ...product.materials,
        ...product.colors,
      ]
        .join(' ')
        .toLowerCase(),
      attributeText: [...product.materials, ...product.colors, product.description].join(' ').toLowerCase(),
      order,
    }));
  }

  static fromSources(houseItems: HouseItemRow[], partnerRows: PartnerRow[]): CatalogIndex {
    const house = houseItems.map(normalizeHouseItem);
    const partner: Product[] = [];
    let skipped = 0;
    for (const row of partnerRows) {
      const product = normalizePartnerRow(row);
      if (product) partner.push(product);
      else skipped++;
    }
    if (skipped > 0) {
      logger.debug('Partner rows skipped during normalization', { skipped });
    }
    logger.info('Catalog index built', { houseBrand: house.length, partnerLine: partner.length });
    return new CatalogIndex([...house, ...partner]);
  }

  get size(): number {
    return this.entries.length;
  }

  getById(id: string): Product | undefined {
    const wanted = id.trim().toLowerCase();
    return this.entries.find((entry) => entry.product.id.toLowerCase() === wanted)?.product;
  }

  search(queryTerms: string | string[], constraints: CatalogConstraints = {}): Product[] {
    return this.match(queryTerms, constraints).map((m) => m.product);
  }

  /**
   * Substring and range matching. Ordered by numeric distance, then source
   * priority (house-brand first), then load order.
   */
  match(queryTerms: string | string[], constraints: CatalogConstraints = {}): CatalogMatch[] {
    const terms = tokenize(queryTerms);
    const tolerance = constraints.toleranceCm ?? DEFAULT_TOLERANCE_CM;
    const limit = Math.min(Math.max(Math.trunc(constraints.limit ?? DEFAULT_RESULT_LIMIT), 1), MAX_RESULT_LIMIT);
    const material = constraints.material?.trim().toLowerCase();
    const color = constraints.color?.trim().toLowerCase();
    const category = constraints.category?.trim().toLowerCase();

    const matches: Array<CatalogMatch & { order: number }> = [];

    for (const entry of this.entries) {
      const { product } = entry;

      if (!terms.every((term) => entry.searchText.includes(term))) continue;
      if (constraints.source && product.source !== constraints.source) continue;
      if (constraints.inStockOnly && product.inStock !== true) continue;
      if (material && !entry.attributeText.includes(material)) continue;
      if (color && !product.colors.some((c) => c.toLowerCase().includes(color)) && !entry.attributeText.includes(color)) continue;
      if (category && !product.category.toLowerCase().includes(category)) continue;

      if (constraints.minPrice !== undefined || constraints.maxPrice !== undefined) {
        if (product.price === null) continue;
        if (constraints.minPrice !== undefined && product.price < constraints.minPrice) continue;
        if (constraints.maxPrice !== undefined && product.price > constraints.maxPrice) continue;
      }

      let distanceCm = 0;
      if (constraints.nearCm !== undefined) {
        const distance = this.distance(product.dimensionsCm, constraints.nearCm, constraints.dimension);
        if (distance === null || distance > tolerance) continue;
        distanceCm = distance;
      }

      matches.push({ product, distanceCm, order: entry.order });
    }

    matches.sort(
      (a, b) =>
        a.distanceCm - b.distanceCm ||
        SOURCE_PRIORITY[a.product.source] - SOURCE_PRIORITY[b.product.source] ||
        a.order - b.order
    );

    return matches.slice(0, limit).map(({ product, distanceCm }) => ({ product, distanceCm }));
  }

  private distance(dimensions: Dimensions, target: number, axis?: DimensionAxis): number | null {
    const values = (axis ? [dimensions[axis]] : AXES.map((a) => dimensions[a])).filter(
      (value): value is number => value !== undefined
    );
    if (values.length === 0) return null;
    return Math.min(...values.map((value) => Math.abs(value - target)));
  }
}
