import { describe, it, expect } from 'vitest';

import { officeSuppliesModule } from '@/modules/cost-modules/index.js';

import { summarizeLines } from '../../fixtures/line-items.js';
import { makeModuleContext } from '../../fixtures/reference-data.js';

describe('officeSuppliesModule', () => {
  const context = makeModuleContext();

  it('prices catalog items and annualises equipment', () => {
    const result = officeSuppliesModule.compute(
      {
        kind: 'office_supplies',
        items: [
          { item: ' Paper plain ', quantity: 1000 },
          {
            label: 'Printer',
            item: 'Multifunciton Photocopier, Fax, Printer and Scanner',
            usefulLifeYears: 5,
          },
        ],
      },
      context
    );

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(summarizeLines(result.value)).toEqual([
        { component: 'Office supplies: Paper plain', amount: '20', currency: 'USD', year: 2019 },
        { component: 'Office supplies: Printer', amount: '440', currency: 'USD', year: 2019 },
      ]);
    }
  });

  it('reports an item missing from the catalog', () => {
    const result = officeSuppliesModule.compute(
      { kind: 'office_supplies', items: [{ item: 'Stapler' }] },
      context
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.module).toBe('office_supplies');
      expect(result.error.cause).toMatchObject({ table: 'supplies', key: 'Stapler' });
    }
  });
});
