export type ProductSource = 'house-brand' | 'partner-line';

export type DimensionAxis = 'width' | 'height' | 'depth';

export interface Dimensions {
  width?: number;
  height?: number;
  depth?: number;
}

export interface Product {
  id: string;
  name: string;
  source: ProductSource;
  category: string;
  /** USD, rounded to cents. `null` when the source row carries no usable price. */
  price: number | null;
  currency: 'USD';
  originalPrice: { amount: number; currency: 'SAR' } | null;
  dimensionsCm: Dimensions;
  materials: string[];
  colors: string[];
  inStock: boolean | null;
  link: string | null;
  description: string;
  designer: string | null;
  leadTimeDays: number | null;
}

export interface CatalogConstraints {
  nearCm?: number;
  dimension?: DimensionAxis;
  toleranceCm?: number;
  material?: string;
  color?: string;
  category?: string;
  minPrice?: number;
  maxPrice?: number;
  inStockOnly?: boolean;
  source?: ProductSource;
  limit?: number;
}

export interface CatalogMatch {
  product: Product;
  /** Absolute cm distance to the requested size, 0 without a size constraint. */
  distanceCm: number;
}
