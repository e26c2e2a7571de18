import { z } from 'zod';
import { CatalogIndex, DEFAULT_TOLERANCE_CM, SAR_TO_USD } from '../catalog.service';
import { RepairEstimationEngine } from '../repair.service';
import { LogSink } from '../interactionLog.service';
import { CatalogMatch } from '../../types/catalog';
import { errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { RegisteredTool, defineTool } from './registry';

export interface ToolDependencies {
  catalog: CatalogIndex;
  repairs: RepairEstimationEngine;
  logSink: LogSink;
}

const email = z.string().trim().email();
const text = z.string().trim().min(1);

function toResultView({ product, distanceCm }: CatalogMatch) {
  return {
    id: product.id,
    name: product.name,
    source: product.source,
    category: product.category,
    price_usd: product.price,
    ...(product.originalPrice
      ? {
          original_price_sar: product.originalPrice.amount,
          price_note: `Converted from SAR at 1 SAR = ${SAR_TO_USD.toFixed(4)} USD`,
        }
      : {}),
    dimensions_cm: product.dimensionsCm,
    materials: product.materials,
    colors: product.colors,
    in_stock: product.inStock,
    ...(product.leadTimeDays !== null ? { lead_time_days: product.leadTimeDays } : {}),
    link: product.link,
    distance_cm: distanceCm,
  };
}

export function createTools(deps: ToolDependencies): RegisteredTool[] {
  const issues = deps.repairs.listIssues().join(', ');

  const lookupProduct = defineTool({
    name: 'lookup_product',
    description:
      'Search the house-brand catalog and the partner-line dataset. Returns matching products tagged by source ' +
      '(house-brand listed before partner-line) with prices in USD, dimensions in cm, materials, colors, ' +
      'availability and a link when available. Use near_cm for size requests such as "around 180 cm".',
    args: {
      query: z.string().describe('Keywords, category, color, SKU or partner item ID to search for.'),
      near_cm: z.number().positive().optional().describe('Target size in centimetres.'),
      dimension: z
        .enum(['width', 'height', 'depth'])
        .optional()
        .describe('Which dimension near_cm refers to. Omit to compare against the closest dimension.'),
      tolerance_cm: z
        .number()
        .nonnegative()
        .optional()
        .describe(`Allowed deviation from near_cm in cm (default ${DEFAULT_TOLERANCE_CM}).`),
      material: z.string().optional().describe('Material filter, e.g. oak, glass, fabric.'),
      color: z.string().optional().describe('Color filter.'),
      max_price: z.number().nonnegative().optional().describe('Upper price bound in USD.'),
      in_stock_only: z.boolean().optional().describe('Only return items that are in stock.'),
    },
    handler: async (args) => {
      const query = args.query.trim();
      const matches = deps.catalog.match(query, {
        nearCm: args.near_cm,
        dimension: args.dimension,
        toleranceCm: args.tolerance_cm,
        material: args.material,
        color: args.color,
        maxPrice: args.max_price,
        inStockOnly: args.in_stock_only,
      });

      if (matches.length === 0) {
        return {
          ok: true,
          data: { query, count: 0, results: [], message: `No products found for "${query}".` },
        };
      }

      return {
        ok: true,
        data: {
          query,
          count: matches.length,
          currency: 'USD',
          house_brand_count: matches.filter((m) => m.product.source === 'house-brand').length,
          partner_line_count: matches.filter((m) => m.product.source === 'partner-line').length,
          results: matches.map(toResultView),
        },
      };
    },
  });

  const estimateRepair = defineTool({
    name: 'estimate_repair',
    description:
      'Estimate repair price and turnaround as three tiers (budget, standard, rush), each a price range in USD ' +
      'and a duration range in days. If the result is NotFound, tell the customer no estimate can be given ' +
      `without an inspection; never invent a price. Known issues: ${issues}.`,
    args: {
      issue: text.describe('Issue type, e.g. scratch, broken_glass, wobble, loose_joint, upholstery_tear.'),
      material: z.string().optional().describe('Primary material: wood, glass, metal, fabric, leather or any.'),
      size_category: z
        .string()
        .optional()
        .describe('Furniture size: extra_small, small, medium, large or extra_large. Defaults to medium.'),
    },
    handler: async (args, context) => {
      const outcome = deps.repairs.estimate(args.issue, args.material, args.size_category);

      if (!outcome.found) {
        const { issue, material, size } = outcome.requested;
        try {
          await deps.logSink.append({
            kind: 'feedback_question',
            question: `Repair estimate requested without rule coverage: issue=${issue}, material=${material ?? 'unspecified'}, size=${size}`,
            context: outcome.detail,
            sessionId: context.sessionId,
          });
        } catch (error) {
          // The NotFound answer still goes back to the model.
          logger.warn('Uncovered repair request not logged', {
            requested: outcome.requested,
            sessionId: context.sessionId,
            error: errorMessage(error),
          });
        }
        return {
          ok: false,
          error: 'NotFound',
          message:
            'Cannot provide an estimate: insufficient rule coverage for this issue, material and size. ' +
            'Tell the customer a technician needs to inspect it; do not quote a price.',
          details: { requested: outcome.requested, reason: outcome.reason, detail: outcome.detail },
        };
      }

      return {
        ok: true,
        data: {
          resolution: outcome.resolution,
          requested: outcome.requested,
          resolved: outcome.resolved,
          currency: outcome.currency,
          tiers: outcome.tiers,
          warnings: outcome.warnings,
        },
      };
    },
  });

  const recordCustomerInterest = defineTool({
    name: 'record_customer_interest',
    description: 'Capture customer contact details when they are ready to buy or book a repair.',
    args: {
      name: text.describe('Customer full name.'),
      email: email.describe('Customer email address.'),
      intent: text.describe('What they want: purchase, repair, delivery, or a short phrase.'),
      note: text.describe('Short note about the product or repair request.'),
    },
    handler: async (args, context) => {
      const record = await deps.logSink.append({
        kind: 'lead',
        name: args.name,
        email: args.email,
        intent: args.intent,
        note: args.note,
        sessionId: context.sessionId,
      });
      return {
        ok: true,
        data: { recorded: true, record_id: record.id, message: "Thanks! We'll follow up soon." },
      };
    },
  });

  const recordFeedback = defineTool({
    name: 'record_feedback',
    description: 'Log a customer question the assistant could not resolve.',
    args: {
      question: text.describe('The unanswered or unclear customer request.'),
    },
    handler: async (args, context) => {
      const record = await deps.logSink.append({
        kind: 'feedback_question',
        question: args.question,
        sessionId: context.sessionId,
      });
      return {
        ok: true,
        data: { recorded: true, record_id: record.id, message: "Noted. We'll improve our answers." },
      };
    },
  });

  const recordServiceFeedback = defineTool({
    name: 'record_service_feedback',
    description: 'Capture post-service feedback about a purchase, repair, delivery or installation.',
    args: {
      name: text.describe('Customer full name.'),
      email: email.describe('Customer email to match the service record.'),
      service_type: text.describe('What was delivered, e.g. purchase, repair, delivery, install.'),
      satisfaction: text.describe('Sentiment summary, e.g. happy, neutral, unhappy, or 1-5.'),
      comments: z.string().optional().describe('Optional free-text feedback.'),
    },
    handler: async (args, context) => {
      const record = await deps.logSink.append({
        kind: 'service_feedback',
        name: args.name,
        email: args.email,
        serviceType: args.service_type,
        satisfaction: args.satisfaction,
        comments: args.comments ?? '',
        sessionId: context.sessionId,
      });
      return {
        ok: true,
        data: {
          recorded: true,
          record_id: record.id,
          message: "Thanks for the feedback! We'll share it with the team.",
        },
      };
    },
  });

  return [lookupProduct, estimateRepair, recordCustomerInterest, recordFeedback, recordServiceFeedback];
}
