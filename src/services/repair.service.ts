import { RepairRulesFile } from '../config/datasets';
import {
  EstimateOutcome,
  EstimateTier,
  RepairEstimate,
  RepairKey,
  RepairNotFound,
  Resolution,
  RuleTableData,
  RuleTiers,
  RuleWarning,
  SIZE_CLASSES,
  SizeClass,
  TIER_ORDER,
} from '../types/repair';
import { logger } from '../utils/logger';

export const DEFAULT_SIZE: SizeClass = 'medium';
export const ANY_MATERIAL = 'any';

const SIZE_ALIASES: Record<string, SizeClass> = {
  xs: 'extra_small',
  tiny: 'extra_small',
  s: 'small',
  m: 'medium',
  mid: 'medium',
  l: 'large',
  big: 'large',
  xl: 'extra_large',
  huge: 'extra_large',
};

export function normalizeKey(value: string): string {
  return value.trim().toLowerCase().replace(/[\s-]+/g, '_');
}

function sizeRank(size: string): number {
  return SIZE_CLASSES.findIndex((s) => s === size);
}

/**
 * Picks the listed size closest to `requested` by ordinal distance.
 * Equal distance on both sides resolves to the smaller size.
 */
export function nearestSize(requested: string, available: Iterable<string>): string | undefined {
  const target = sizeRank(requested);
  if (target < 0) return undefined;

  let best: { size: string; distance: number; rank: number } | undefined;
  for (const size of available) {
    const rank = sizeRank(size);
    if (rank < 0) continue;
    const distance = Math.abs(rank - target);
    if (!best || distance < best.distance || (distance === best.distance && rank < best.rank)) {
      best = { size, distance, rank };
    }
  }
  return best?.size;
}

/** Reports inconsistent source data. Values are never corrected. */
export function inspectTiers(tiers: RuleTiers): RuleWarning[] {
  const warnings: RuleWarning[] = [];
  for (const tier of TIER_ORDER) {
    const { minPrice, maxPrice, minDays, maxDays } = tiers[tier];
    if (minPrice > maxPrice) {
      warnings.push({
        code: 'price_range_inverted',
        tier,
        message: `${tier} price range is inverted (${minPrice} > ${maxPrice})`,
      });
    }
    if (minDays > maxDays) {
      warnings.push({
        code: 'duration_range_inverted',
        tier,
        message: `${tier} duration range is inverted (${minDays} > ${maxDays} days)`,
      });
    }
  }
  if (tiers.budget.minPrice > tiers.standard.minPrice || tiers.standard.minPrice > tiers.rush.minPrice) {
    warnings.push({
      code: 'tier_price_order',
      message: `tier minimum prices are out of order (budget ${tiers.budget.minPrice}, standard ${tiers.standard.minPrice}, rush ${tiers.rush.minPrice})`,
    });
  }
  return warnings;
}

/** Immutable issue → material → size lookup, keys normalized at load. */
export class RepairRuleTable {
  constructor(
    private readonly data: RuleTableData,
    private readonly aliases: Map<string, string> = new Map(),
    readonly currency: string = 'USD'
  ) {}

  static fromFile(file: RepairRulesFile): RepairRuleTable {
    const data: RuleTableData = new Map();
    for (const [issue, materials] of Object.entries(file.rules)) {
      const byMaterial = new Map<string, Map<string, RuleTiers>>();
      for (const [material, sizes] of Object.entries(materials)) {
        const bySize = new Map<string, RuleTiers>();
        for (const [size, tiers] of Object.entries(sizes)) {
          bySize.set(normalizeKey(size), {
            budget: toTier(tiers.budget),
            standard: toTier(tiers.standard),
            rush: toTier(tiers.rush),
          });
        }
        byMaterial.set(normalizeKey(material), bySize);
      }
      data.set(normalizeKey(issue), byMaterial);
    }

    const aliases = new Map<string, string>();
    for (const [alias, target] of Object.entries(file.aliases)) {
      aliases.set(normalizeKey(alias), normalizeKey(target));
    }

    return new RepairRuleTable(data, aliases, file.currency);
  }

  resolveIssue(issue: string): string {
    const key = normalizeKey(issue);
    return this.data.has(key) ? key : this.aliases.get(key) ?? key;
  }

  materialsFor(issue: string): ReadonlyMap<string, ReadonlyMap<string, RuleTiers>> | undefined {
    return this.data.get(issue);
  }

  get(issue: string, material: string, size: string): RuleTiers | undefined {
    return this.data.get(issue)?.get(material)?.get(size);
  }

  listIssues(): string[] {
    return [...this.data.keys()];
  }
}

function toTier(raw: { min_price: number; max_price: number; min_days: number; max_days: number }) {
  return { minPrice: raw.min_price, maxPrice: raw.max_price, minDays: raw.min_days, maxDays: raw.max_days };
}

export class RepairEstimationEngine {
  constructor(private readonly table: RepairRuleTable) {}

  listIssues(): string[] {
    return this.table.listIssues();
  }

  estimate(issue: string, material?: string | null, sizeClass?: string | null): EstimateOutcome {
    const issueKey = this.table.resolveIssue(issue);
    const materialKey = material && material.trim() ? normalizeKey(material) : null;
    const sizeKey = this.normalizeSize(sizeClass);
    const requested: RepairKey = { issue: issueKey, material: materialKey, size: sizeKey };

    const byMaterial = this.table.materialsFor(issueKey);
    if (!byMaterial) {
      return this.notFound(requested, `no rules for issue "${issueKey}"`);
    }

    // 1 + 2: the requested material, exact size then nearest size
    const sizes = materialKey ? byMaterial.get(materialKey) : undefined;
    if (materialKey && sizes) {
      const exact = sizes.get(sizeKey);
      if (exact) return this.build('exact', requested, materialKey, sizeKey, exact);

      const nearest = nearestSize(sizeKey, sizes.keys());
      const nearestTiers = nearest ? sizes.get(nearest) : undefined;
      if (nearest && nearestTiers) {
        return this.build('nearest_size', requested, materialKey, nearest, nearestTiers);
      }
    }

    // 3: any material carrying the exact size, the catch-all material first
    const fallbackMaterial = [ANY_MATERIAL, ...byMaterial.keys()].find((m) => byMaterial.get(m)?.has(sizeKey));
    const fallbackTiers = fallbackMaterial ? byMaterial.get(fallbackMaterial)?.get(sizeKey) : undefined;
    if (fallbackMaterial && fallbackTiers) {
      return this.build('any_material', requested, fallbackMaterial, sizeKey, fallbackTiers);
    }

    return this.notFound(
      requested,
      `no rule for issue "${issueKey}" covers material "${materialKey ?? 'unspecified'}" at size "${sizeKey}"`
    );
  }

  private normalizeSize(sizeClass?: string | null): string {
    if (!sizeClass || !sizeClass.trim()) return DEFAULT_SIZE;
    const key = normalizeKey(sizeClass);
    return SIZE_ALIASES[key] ?? key;
  }

  private build(
    resolution: Resolution,
    requested: RepairKey,
    material: string,
    size: string,
    tiers: RuleTiers
  ): RepairEstimate {
    const warnings = inspectTiers(tiers);
    if (warnings.length > 0) {
      logger.warn('Repair rule entry is inconsistent', {
        issue: requested.issue,
        material,
        size,
        warnings: warnings.map((w) => w.code),
      });
    }

    const ordered: EstimateTier[] = TIER_ORDER.map((tier) => ({
      tier,
      price: { min: tiers[tier].minPrice, max: tiers[tier].maxPrice },
      durationDays: { min: tiers[tier].minDays, max: tiers[tier].maxDays },
    }));

    logger.debug('Repair estimate resolved', { requested, resolution, material, size });

    return {
      found: true,
      resolution,
      requested,
      resolved: { issue: requested.issue, material, size },
      currency: this.table.currency,
      tiers: ordered,
      warnings,
    };
  }

  private notFound(requested: RepairKey, detail: string): RepairNotFound {
    logger.info('Repair estimate not available', { requested, detail });
    return { found: false, requested, reason: 'insufficient rule coverage', detail };
  }
}
