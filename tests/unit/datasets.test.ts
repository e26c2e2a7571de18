import fs from 'fs';
import os from 'os';
import path from 'path';
import { DATASET_FILES, loadDatasets } from '../../src/config/datasets';
import { DatasetError } from '../../src/utils/errors';
import { buildSystemPrompt } from '../../src/utils/prompts';

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const DATA_DIR = path.resolve(__dirname, '../../data');

const minimalRules = {
  rules: {
    scratch: {
      wood: {
        small: {
          budget: { min_price: 28, max_price: 45, min_days: 3, max_days: 5 },
          standard: { min_price: 45, max_price: 63, min_days: 1, max_days: 2 },
          rush: { min_price: 69, max_price: 88, min_days: 1, max_days: 1 },
        },
      },
    },
  },
};

describe('loadDatasets', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'datasets-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(file: string, content: unknown) {
    fs.writeFileSync(path.join(dir, file), typeof content === 'string' ? content : JSON.stringify(content));
  }

  it('should refuse to start without a rule table', () => {
    expect(() => loadDatasets(dir)).toThrow(DatasetError);
    expect(() => loadDatasets(dir)).toThrow(`Dataset "repair_rules.json" unusable: not found in ${path.resolve(dir)}`);
  });

  it('should reject a rule table that is not valid JSON', () => {
    write(DATASET_FILES.repairRules, '{ "rules": ');

    expect(() => loadDatasets(dir)).toThrow(/Dataset "repair_rules.json" unusable: invalid JSON/);
  });

  it('should reject a rule table with non-numeric bounds', () => {
    write(DATASET_FILES.repairRules, {
      rules: { scratch: { wood: { small: { ...minimalRules.rules.scratch.wood.small, rush: { min_price: 'cheap' } } } } },
    });

    expect(() => loadDatasets(dir)).toThrow('rules.scratch.wood.small.rush.min_price: Expected number, received string');
  });

  it('should load with empty catalogs when only the rule table exists', () => {
    write(DATASET_FILES.repairRules, minimalRules);

    const datasets = loadDatasets(dir);

    expect(datasets.houseItems).toEqual([]);
    expect(datasets.partnerRows).toEqual([]);
    expect(datasets.business).toBeNull();
    expect(datasets.repairRules.currency).toBe('USD');
    expect(datasets.repairRules.aliases).toEqual({});
  });

  it('should load the bundled data', () => {
    const datasets = loadDatasets(DATA_DIR);

    expect(datasets.houseItems).toHaveLength(7);
    expect(datasets.partnerRows).toHaveLength(10);
    expect(datasets.business?.name).toBe('Oak & Mend');
    expect(Object.keys(datasets.repairRules.rules)).toContain('broken_glass');
  });
});

describe('buildSystemPrompt', () => {
  it('should include the business profile and repair coverage', () => {
    const { business } = loadDatasets(DATA_DIR);

    const prompt = buildSystemPrompt(business, { repairIssues: ['scratch', 'wobble'] });

    expect(prompt).toContain('You work at Oak & Mend, Furniture sales and repair studio.');
    expect(prompt).toContain('Business hours: Sat-Thu 10am-9pm.');
    expect(prompt).toContain('REPAIR ISSUES WE PRICE:\nscratch, wobble');
  });

  it('should work without a business profile', () => {
    const prompt = buildSystemPrompt(null);

    expect(prompt).not.toContain('BUSINESS INFO');
    expect(prompt).toContain('Use lookup_product');
  });
});
