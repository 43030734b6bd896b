import { describe, it, expect } from 'vitest';

import { personnelModule } from '@/modules/cost-modules/index.js';

import { summarizeLines } from '../../fixtures/line-items.js';
import { makeModuleContext } from '../../fixtures/reference-data.js';

describe('personnelModule', () => {
  const context = makeModuleContext();

  it('prices staff at the salary of their cadre level', () => {
    const result = personnelModule.compute(
      {
        kind: 'personnel',
        items: [
          { label: 'Manager', cadreLevel: 5 },
          { label: 'Cleaner', cadreLevel: 1, headcount: 3 },
        ],
      },
      context
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(summarizeLines(result.value)).toEqual([
        { component: 'Personnel: Manager', amount: '30000', currency: 'I$', year: 2019 },
        { component: 'Personnel: Cleaner', amount: '18000', currency: 'I$', year: 2019 },
      ]);
    }
  });

  it('repeats staff in every division when requested', () => {
    const result = personnelModule.compute(
      {
        kind: 'personnel',
        items: [
          { label: 'District nurse', cadreLevel: 3, headcount: 2, division: 'district', perDivision: true },
        ],
      },
      context
    );

    // 12000 × 2 × 135 districts
    expect(result.isOk() && result.value[0]?.money.amount.toString()).toBe('3240000');
  });

  it('ignores the division unless perDivision is set', () => {
    const result = personnelModule.compute(
      { kind: 'personnel', items: [{ label: 'Advisor', cadreLevel: 4, division: 'provincial' }] },
      context
    );

    expect(result.isOk() && result.value[0]?.money.amount.toString()).toBe('20000');
  });

  it('scales a standardized headcount to the national population', () => {
    const result = personnelModule.compute(
      { kind: 'personnel', items: [{ label: 'Manager', cadreLevel: 5, fitToPopulation: true }] },
      context
    );

    // 30000 × 44,000,000 / 50,000,000
    expect(result.isOk() && result.value[0]?.money.amount.toString()).toBe('26400');
  });

  it('scales per division before repeating across divisions', () => {
    const result = personnelModule.compute(
      {
        kind: 'personnel',
        items: [
          {
            label: 'Coordinator',
            cadreLevel: 3,
            division: 'provincial',
            perDivision: true,
            fitToPopulation: true,
          },
        ],
      },
      context
    );

    // 12000 × (44,000,000 / 4) / 5,000,000 × 4 provinces
    expect(result.isOk() && result.value[0]?.money.amount.toString()).toBe('105600');
  });

  it('reports a missing population when fitting to it', () => {
    const result = personnelModule.compute(
      { kind: 'personnel', items: [{ label: 'Manager', cadreLevel: 5, fitToPopulation: true }] },
      makeModuleContext({ country: 'NPL' })
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.cause).toMatchObject({ table: 'population' });
    }
  });

  it('reports a missing salary as a data gap', () => {
    const result = personnelModule.compute(
      { kind: 'personnel', items: [{ label: 'Nurse', cadreLevel: 3 }] },
      makeModuleContext({ country: 'NPL' })
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe('DataGapError');
      expect(result.error.module).toBe('personnel');
      expect(result.error.country).toBe('NPL');
      expect(result.error.cause).toMatchObject({ table: 'salaries', key: 'NPL/3' });
      expect(result.error.message).toBe("personnel for NPL: No row for 'NPL/3' in salaries");
    }
  });

  it('returns no lines for an empty item list', () => {
    const result = personnelModule.compute({ kind: 'personnel', items: [] }, context);

    expect(result.isOk() && result.value).toEqual([]);
  });
});
