import { Decimal } from 'decimal.js';
import { describe, it, expect } from 'vitest';

import {
  costProgramme,
  costProgrammeCsv,
  type CostLedgerEntry,
  type ProgrammeConfig,
} from '@/modules/programme-costing/index.js';

import { makeCostingDeps } from '../../fixtures/reference-data.js';
import { makeTestTemplates } from '../../fixtures/templates.js';

import type { ModuleConfig } from '@/modules/cost-modules/index.js';

const summarize = (entries: readonly CostLedgerEntry[]) =>
  entries.map((entry) => ({
    year: entry.year,
    component: entry.component,
    module: entry.module,
    cost: entry.cost.toString(),
  }));

const manager: ModuleConfig = { kind: 'personnel', items: [{ label: 'Manager', cadreLevel: 5 }] };
const localVisits: ModuleConfig = {
  kind: 'per_diem',
  items: [{ label: 'Visits', division: 'district', local: true, travellers: 1, days: 1 }],
};

const makeConfig = (overrides: Partial<ProgrammeConfig> = {}): ProgrammeConfig => ({
  country: 'UGA',
  startYear: 2020,
  endYear: 2020,
  discountRate: new Decimal(0),
  desiredCurrency: 'USA',
  desiredYear: 2019,
  modules: [manager],
  ...overrides,
});

describe('costProgramme', () => {
  const deps = makeCostingDeps();

  it('rebases, discounts and orders the ledger by year then component', () => {
    const result = costProgramme(
      deps,
      makeConfig({ endYear: 2021, discountRate: new Decimal('0.25'), modules: [manager, localVisits] })
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(summarize(result.value)).toEqual([
        { year: 2020, component: 'Per diem: Visits', module: 'per_diem', cost: '10' },
        { year: 2020, component: 'Personnel: Manager', module: 'personnel', cost: '30000' },
        // divided by 1.25
        { year: 2021, component: 'Per diem: Visits', module: 'per_diem', cost: '8' },
        { year: 2021, component: 'Personnel: Manager', module: 'personnel', cost: '24000' },
      ]);
    }
  });

  it('converts into the desired local currency and price year', () => {
    const result = costProgramme(deps, makeConfig({ desiredCurrency: 'UGA', desiredYear: 2021 }));

    // 30000 I$ 2019 × PPP_UGA(2021)=1500 × 125/100
    expect(result.isOk() && summarize(result.value)[0]?.cost).toBe('56250000');
  });

  it('sums line items that share a component within a year', () => {
    const result = costProgramme(
      deps,
      makeConfig({
        modules: [
          {
            kind: 'personnel',
            items: [
              { label: 'Manager', cadreLevel: 5 },
              { label: 'Manager', cadreLevel: 4 },
            ],
          },
        ],
      })
    );

    expect(result.isOk() && summarize(result.value)).toEqual([
      { year: 2020, component: 'Personnel: Manager', module: 'personnel', cost: '50000' },
    ]);
  });

  it('orders components by code unit, not locale', () => {
    const result = costProgramme(
      deps,
      makeConfig({
        modules: [
          {
            kind: 'personnel',
            items: [
              { label: 'alpha', cadreLevel: 1 },
              { label: 'Zeta', cadreLevel: 1 },
              { label: 'Alpha', cadreLevel: 1 },
            ],
          },
        ],
      })
    );

    expect(result.isOk() && result.value.map((entry) => entry.component)).toEqual([
      'Personnel: Alpha',
      'Personnel: Zeta',
      'Personnel: alpha',
    ]);
  });

  it('follows yearly population in population-driven modules', () => {
    const result = costProgramme(
      deps,
      makeConfig({ endYear: 2021, modules: [makeTestTemplates().get('media') ?? manager] })
    );

    expect(result.isOk() && result.value.map((entry) => entry.cost.toString())).toEqual([
      '44000',
      '45000',
    ]);
  });

  describe('discounting', () => {
    it('keeps every year equal at a zero rate', () => {
      const result = costProgramme(deps, makeConfig({ endYear: 2022 }));

      expect(result.isOk() && result.value.map((entry) => entry.cost.toString())).toEqual([
        '30000',
        '30000',
        '30000',
      ]);
    });

    it('never discounts the first year', () => {
      const result = costProgramme(deps, makeConfig({ discountRate: new Decimal('0.5') }));

      expect(result.isOk() && result.value[0]?.cost.toString()).toBe('30000');
    });

    it('lowers later years more at a higher rate', () => {
      const low = costProgramme(deps, makeConfig({ endYear: 2021, discountRate: new Decimal('0.03') }));
      const high = costProgramme(deps, makeConfig({ endYear: 2021, discountRate: new Decimal('0.05') }));

      expect(low.isOk() && high.isOk()).toBe(true);
      if (low.isOk() && high.isOk()) {
        const lowLater = low.value[1]?.cost ?? new Decimal(0);
        const highLater = high.value[1]?.cost ?? new Decimal(0);
        expect(highLater.lessThan(lowLater)).toBe(true);
        expect(lowLater.lessThan(new Decimal(30000))).toBe(true);
      }
    });
  });

  describe('errors', () => {
    it('aborts on the first data gap', () => {
      const result = costProgramme(
        deps,
        makeConfig({ country: 'NPL', modules: [manager, localVisits] })
      );

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.type).toBe('DataGapError');
        expect(result.error).toMatchObject({ module: 'per_diem', country: 'NPL' });
      }
    });

    it('aborts when a line item cannot be rebased', () => {
      const result = costProgramme(
        deps,
        makeConfig({
          modules: [
            {
              kind: 'media',
              items: [
                {
                  label: 'Radio',
                  per: 'thousand',
                  unitCost: { amount: 1, currency: 'NPL', year: 2019 },
                },
              ],
            },
          ],
        })
      );

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error).toMatchObject({
          type: 'MissingSeriesError',
          country: 'NPL',
          seriesName: 'ppp_conversion_factor',
        });
      }
    });
  });
});

describe('costProgrammeCsv', () => {
  const deps = { ...makeCostingDeps(), templates: makeTestTemplates() };
  const input = {
    country: 'UGA',
    start_year: 2020,
    end_year: 2020,
    discount_rate: 0,
    desired_currency: 'USD',
    desired_year: 2019,
    modules: [localVisits],
  };

  it('resolves, costs and formats a programme', () => {
    const result = costProgrammeCsv(deps, input);

    expect(result.isOk() && result.value).toBe(
      'year,component,module,cost\n2020,Per diem: Visits,per_diem,10.00\n'
    );
  });

  it('appends yearly totals on request', () => {
    const result = costProgrammeCsv(deps, input, { summary: true });

    expect(result.isOk() && result.value).toBe(
      'year,component,module,cost\n2020,Per diem: Visits,per_diem,10.00\n2020,Total,,10.00\n'
    );
  });

  it('returns configuration errors before costing', () => {
    const result = costProgrammeCsv(deps, { ...input, country: 'XYZ' });

    expect(result.isErr() && result.error.type).toBe('ConfigError');
  });
});
