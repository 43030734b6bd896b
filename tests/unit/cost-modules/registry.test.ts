import { ok } from 'neverthrow';
import { describe, it, expect, vi } from 'vitest';

import { moneyAt } from '@/common/types/money.js';
import {
  COST_MODULE_KINDS,
  COST_MODULES,
  computeModule,
  isCostModuleKind,
  type CostModuleRegistry,
} from '@/modules/cost-modules/index.js';

import { makeModuleContext } from '../../fixtures/reference-data.js';

describe('cost module registry', () => {
  it('registers one module per kind', () => {
    for (const kind of COST_MODULE_KINDS) {
      expect(COST_MODULES[kind].kind).toBe(kind);
    }
  });

  it('recognises module identifiers', () => {
    expect(isCostModuleKind('per_diem')).toBe(true);
    expect(isCostModuleKind('staff')).toBe(false);
  });

  it('dispatches a configuration to the module of its kind', () => {
    const compute = vi.fn(() => ok([{ component: 'Media: Stub', money: moneyAt(1, 'USD', 2019) }]));
    const modules: CostModuleRegistry = {
      ...COST_MODULES,
      media: { kind: 'media', title: 'Media', compute },
    };
    const context = makeModuleContext();
    const config = { kind: 'media' as const, items: [] };

    const result = computeModule(config, context, modules);

    expect(compute).toHaveBeenCalledWith(config, context);
    expect(result.isOk() && result.value.map((line) => line.component)).toEqual(['Media: Stub']);
  });
});
