import { houseItemSchema, partnerRowSchema, RepairRulesFile } from '../../src/config/datasets';
import { CatalogIndex } from '../../src/services/catalog.service';
import { LogSink, stampRecord } from '../../src/services/interactionLog.service';
import { RepairEstimationEngine, RepairRuleTable } from '../../src/services/repair.service';
import { ToolDispatcher } from '../../src/services/dispatcher.service';
import { ToolRegistry } from '../../src/services/tools/registry';
import { createTools } from '../../src/services/tools/definitions';
import { ReasoningBackend, ReasoningRequest, ReasoningResponse } from '../../src/types/agent';
import { LogRecord, LogRecordInput } from '../../src/types/interaction';
import { ToolCallRequest } from '../../src/types/tools';

type TierTuple = [minPrice: number, maxPrice: number, minDays: number, maxDays: number];

export function tiers(budget: TierTuple, standard: TierTuple, rush: TierTuple) {
  const toRaw = ([min_price, max_price, min_days, max_days]: TierTuple) => ({ min_price, max_price, min_days, max_days });
  return { budget: toRaw(budget), standard: toRaw(standard), rush: toRaw(rush) };
}

export const GLASS_LARGE = tiers([120, 195, 7, 10], [195, 270, 4, 7], [297, 378, 1, 4]);

export function makeRulesFile(): RepairRulesFile {
  return {
    currency: 'USD',
    aliases: { cracked_glass: 'broken_glass' },
    rules: {
      broken_glass: {
        glass: {
          small: tiers([56, 91, 5, 8], [91, 126, 2, 5], [139, 176, 1, 2]),
          medium: tiers([80, 130, 6, 9], [130, 180, 3, 6], [198, 252, 1, 3]),
          large: GLASS_LARGE,
        },
      },
      scratch: {
        wood: {
          small: tiers([28, 45, 3, 5], [45, 63, 1, 2], [69, 88, 1, 1]),
          large: tiers([60, 98, 4, 7], [98, 135, 2, 4], [149, 189, 1, 2]),
        },
        any: {
          medium: tiers([45, 72, 3, 6], [72, 100, 1, 3], [110, 140, 1, 1]),
        },
      },
      wobble: {
        metal: {
          // budget starts above standard and the rush price range is inverted
          medium: tiers([100, 120, 2, 5], [80, 110, 1, 2], [200, 150, 1, 1]),
        },
      },
    },
  };
}

export function makeEngine(file: RepairRulesFile = makeRulesFile()): RepairEstimationEngine {
  return new RepairEstimationEngine(RepairRuleTable.fromFile(file));
}

export function makeCatalog(): CatalogIndex {
  const house = [
    houseItemSchema.parse({
      sku: 'HB-DT-180',
      name: 'Harlow Dining Table',
      category: 'dining table',
      price_usd: 1290,
      dimensions_cm: { width: 180, height: 75, depth: 90 },
      material: 'solid oak',
      color_options: ['natural oak'],
      in_stock: true,
    }),
    houseItemSchema.parse({
      sku: 'HB-CT-110',
      name: 'Lumen Coffee Table',
      category: 'coffee table',
      price_usd: 540,
      dimensions_cm: { width: 110, height: 42, depth: 60 },
      material: 'tempered glass, steel',
      color_options: ['clear'],
      in_stock: false,
    }),
  ];
  const partner = [
    partnerRowSchema.parse({
      item_id: '100',
      name: 'NORRVIK',
      category: 'Tables & desks',
      price: '1195',
      width: '180',
      height: '75',
      depth: '90',
      sellable_online: 'TRUE',
      other_colors: 'white',
      short_description: 'Dining table,    180x90 cm',
    }),
    partnerRowSchema.parse({
      item_id: '200',
      name: 'BERGVIK',
      category: 'Tables & desks',
      price: '100',
      width: '176',
      height: '74',
      depth: '85',
      sellable_online: 'FALSE',
      other_colors: 'No',
      short_description: 'Dining table, pine',
    }),
    partnerRowSchema.parse({
      item_id: '300',
      name: 'RUNDSTA',
      category: 'Cabinets & cupboards',
      price: 'No old price',
      width: '',
      sellable_online: 'yes',
      short_description: 'Sideboard, walnut effect',
    }),
    partnerRowSchema.parse({ item_id: '', name: 'NAMELESS', price: '10' }),
  ];
  return CatalogIndex.fromSources(house, partner);
}

export class MemoryLogSink implements LogSink {
  readonly records: LogRecord[] = [];

  async append(input: LogRecordInput): Promise<LogRecord> {
    const record = stampRecord(input, new Date('2026-03-01T12:00:00.000Z'));
    this.records.push(record);
    return record;
  }
}

export function makeDispatcher(logSink: LogSink = new MemoryLogSink()): ToolDispatcher {
  return new ToolDispatcher(
    new ToolRegistry(createTools({ catalog: makeCatalog(), repairs: makeEngine(), logSink }))
  );
}

type Step = ReasoningResponse | ((request: ReasoningRequest) => ReasoningResponse | Promise<ReasoningResponse>);

/** Reasoning step that plays back a fixed script and records every request. */
export class ScriptedBackend implements ReasoningBackend {
  readonly requests: ReasoningRequest[] = [];
  private index = 0;

  constructor(private readonly steps: Step[]) {}

  async complete(request: ReasoningRequest): Promise<ReasoningResponse> {
    this.requests.push(request);
    const step = this.steps[Math.min(this.index, this.steps.length - 1)];
    this.index++;
    if (step === undefined) {
      throw new Error('ScriptedBackend has no steps');
    }
    return typeof step === 'function' ? step(request) : step;
  }
}

export function reply(text: string): ReasoningResponse {
  return { text, toolCalls: [] };
}

export function callTool(id: string, name: string, args: Record<string, unknown>, text = ''): ReasoningResponse {
  const call: ToolCallRequest = { id, name, arguments: args };
  return { text, toolCalls: [call] };
}
