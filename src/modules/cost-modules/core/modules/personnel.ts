import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { moneyAt } from '@/common/types/money.js';

import { toDataGap } from '../errors.js';
import { componentLabel, divisionCount } from '../shared.js';

import type { AdministrativeLevel } from '../schemas.js';
import type { CostModule, RawLineItem } from '../types.js';
import type { NotFoundError } from '@/modules/reference-data/index.js';

const TITLE = 'Personnel';

/**
 * Population one administrative unit is assumed to have when a headcount is
 * given for a standardized population.
 */
export const STANDARD_POPULATION: Readonly<Record<AdministrativeLevel, Decimal>> = {
  national: new Decimal(50_000_000),
  provincial: new Decimal(5_000_000),
  district: new Decimal(500_000),
};

/**
 * Salaried staff: annual salary of the cadre level times headcount, optionally
 * repeated in every division of the chosen level.
 *
 * With `fitToPopulation` the headcount is scaled by the country's population
 * per division over the standardized population of that level, for the year
 * being costed.
 */
export const personnelModule: CostModule<'personnel'> = {
  kind: 'personnel',
  title: TITLE,
  compute(config, { country, year, store, population }) {
    const gap = toDataGap('personnel', country);
    const lines: RawLineItem[] = [];

    for (const item of config.items) {
      const salary = store.getSalary(country, item.cadreLevel);
      if (salary.isErr()) return err(gap(salary.error));

      const level = item.division ?? 'national';
      const needsDivisions = item.perDivision === true || item.fitToPopulation === true;
      const divisions: Result<Decimal, NotFoundError> = needsDivisions
        ? divisionCount(store, country, level)
        : ok(new Decimal(1));
      if (divisions.isErr()) return err(gap(divisions.error));

      let headcount = new Decimal(item.headcount ?? 1);
      if (item.fitToPopulation === true) {
        const persons = population.resolvePersons(country, year);
        if (persons.isErr()) return err(gap(persons.error));
        headcount = headcount
          .mul(persons.value.div(divisions.value))
          .div(STANDARD_POPULATION[level]);
      }

      let amount = salary.value.annualSalary.mul(headcount);
      if (item.perDivision === true) {
        amount = amount.mul(divisions.value);
      }

      lines.push({
        component: componentLabel(TITLE, item.label),
        money: moneyAt(amount, salary.value.currency, salary.value.year),
      });
    }

    return ok(lines);
  },
};
