export type TierName = 'budget' | 'standard' | 'rush';

export const TIER_ORDER: readonly TierName[] = ['budget', 'standard', 'rush'];

export const SIZE_CLASSES = ['extra_small', 'small', 'medium', 'large', 'extra_large'] as const;

export type SizeClass = (typeof SIZE_CLASSES)[number];

export interface RuleTier {
  minPrice: number;
  maxPrice: number;
  minDays: number;
  maxDays: number;
}

export type RuleTiers = Record<TierName, RuleTier>;

/** issue -> material -> size -> tiers, in source order. */
export type RuleTableData = Map<string, Map<string, Map<string, RuleTiers>>>;

export interface ClosedInterval {
  min: number;
  max: number;
}

export interface EstimateTier {
  tier: TierName;
  price: ClosedInterval;
  durationDays: ClosedInterval;
}

export type Resolution = 'exact' | 'nearest_size' | 'any_material';

export type RuleWarningCode = 'price_range_inverted' | 'duration_range_inverted' | 'tier_price_order';

export interface RuleWarning {
  code: RuleWarningCode;
  tier?: TierName;
  message: string;
}

export interface RepairKey {
  issue: string;
  material: string | null;
  size: string;
}

export interface RepairEstimate {
  found: true;
  resolution: Resolution;
  requested: RepairKey;
  resolved: { issue: string; material: string; size: string };
  currency: string;
  tiers: EstimateTier[];
  warnings: RuleWarning[];
}

export interface RepairNotFound {
  found: false;
  requested: RepairKey;
  reason: 'insufficient rule coverage';
  detail: string;
}

export type EstimateOutcome = RepairEstimate | RepairNotFound;
