import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { DatasetError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const dimension = z.number().positive().optional();

export const houseItemSchema = z.object({
  sku: z.string().min(1),
  name: z.string().min(1),
  category: z.string().default(''),
  price_usd: z.number().nonnegative().nullable().optional(),
  dimensions_cm: z
    .object({ width: dimension, height: dimension, depth: dimension })
    .default({}),
  material: z.string().default(''),
  color_options: z.array(z.string()).default([]),
  in_stock: z.boolean().nullable().optional(),
  description: z.string().default(''),
  link: z.string().optional(),
  lead_time_days: z.number().int().nonnegative().optional(),
});

export type HouseItemRow = z.infer<typeof houseItemSchema>;

// Partner rows come from a scraped export: every cell is text, numbers included.
const cell = z
  .union([z.string(), z.number(), z.boolean()])
  .nullable()
  .optional()
  .transform((value) => (value === undefined || value === null ? '' : String(value)));

export const partnerRowSchema = z.object({
  item_id: cell,
  name: cell,
  category: cell,
  price: cell,
  width: cell,
  height: cell,
  depth: cell,
  sellable_online: cell,
  other_colors: cell,
  short_description: cell,
  designer: cell,
  link: cell,
});

export type PartnerRow = z.infer<typeof partnerRowSchema>;

const tierSchema = z.object({
  min_price: z.number(),
  max_price: z.number(),
  min_days: z.number(),
  max_days: z.number(),
});

export const repairRulesSchema = z.object({
  currency: z.string().min(1).default('USD'),
  aliases: z.record(z.string()).default({}),
  rules: z.record(
    z.record(z.record(z.object({ budget: tierSchema, standard: tierSchema, rush: tierSchema })))
  ),
});

export type RepairRulesFile = z.infer<typeof repairRulesSchema>;

export const businessProfileSchema = z.object({
  name: z.string().min(1),
  tagline: z.string().optional(),
  location: z.string().optional(),
  hours: z.string().optional(),
  phone: z.string().optional(),
  services: z.array(z.string()).default([]),
  policies: z.array(z.string()).default([]),
});

export type BusinessProfile = z.infer<typeof businessProfileSchema>;

export interface Datasets {
  houseItems: HouseItemRow[];
  partnerRows: PartnerRow[];
  repairRules: RepairRulesFile;
  business: BusinessProfile | null;
}

export const DATASET_FILES = {
  houseCatalog: 'catalog.json',
  partnerCatalog: 'partner_catalog.json',
  repairRules: 'repair_rules.json',
  business: 'business.json',
} as const;

function readJson(file: string): unknown | undefined {
  if (!fs.existsSync(file)) return undefined;
  const raw = fs.readFileSync(file, 'utf8');
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new DatasetError(path.basename(file), `invalid JSON (${errorMessage(error)})`);
  }
}

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, name: string, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new DatasetError(name, issues);
  }
  return parsed.data;
}

/**
 * Loads every dataset the core needs from `dataDir`.
 * The repair rule table is mandatory; catalog sources and the business
 * profile degrade to empty with a warning.
 */
export function loadDatasets(dataDir: string): Datasets {
  const resolve = (file: string) => path.resolve(dataDir, file);

  const rulesRaw = readJson(resolve(DATASET_FILES.repairRules));
  if (rulesRaw === undefined) {
    throw new DatasetError(DATASET_FILES.repairRules, `not found in ${path.resolve(dataDir)}`);
  }
  const repairRules = parseWith(repairRulesSchema, DATASET_FILES.repairRules, rulesRaw);

  const houseRaw = readJson(resolve(DATASET_FILES.houseCatalog));
  if (houseRaw === undefined) {
    logger.warn('House catalog missing, continuing without it', { file: DATASET_FILES.houseCatalog });
  }
  const houseItems =
    houseRaw === undefined ? [] : parseWith(z.array(houseItemSchema), DATASET_FILES.houseCatalog, houseRaw);

  const partnerRaw = readJson(resolve(DATASET_FILES.partnerCatalog));
  if (partnerRaw === undefined) {
    logger.warn('Partner catalog missing, continuing without it', { file: DATASET_FILES.partnerCatalog });
  }
  const partnerRows =
    partnerRaw === undefined ? [] : parseWith(z.array(partnerRowSchema), DATASET_FILES.partnerCatalog, partnerRaw);

  const businessRaw = readJson(resolve(DATASET_FILES.business));
  const business =
    businessRaw === undefined ? null : parseWith(businessProfileSchema, DATASET_FILES.business, businessRaw);

  logger.info('Datasets loaded', {
    dataDir,
    houseItems: houseItems.length,
    partnerRows: partnerRows.length,
    issueTypes: Object.keys(repairRules.rules).length,
  });

  return { houseItems, partnerRows, repairRules, business };
}
