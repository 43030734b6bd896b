import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { isCostModuleKind, type ModuleConfig } from '@/modules/cost-modules/index.js';
import { INTERNATIONAL_DOLLAR, normalizeCurrencyCode } from '@/modules/normalization/index.js';
import { normalizeCountryCode, type ReferenceDataStore } from '@/modules/reference-data/index.js';

import { DEFAULT_PROGRAMME_INPUT, MAX_PROGRAMME_YEAR, MIN_PROGRAMME_YEAR } from './defaults.js';
import { createConfigError, type ConfigError } from './errors.js';

import type { ModuleSelection, ProgrammeConfigInput } from './schemas.js';
import type { ModuleTemplates, ProgrammeConfig } from './types.js';

export interface ResolveProgrammeConfigDeps {
  store: ReferenceDataStore;
  templates: ModuleTemplates;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A currency is usable when it is I$ or its country has a PPP series.
 */
export const isKnownCurrency = (store: ReferenceDataStore, currency: string): boolean => {
  const code = normalizeCurrencyCode(currency);
  return (
    code === INTERNATIONAL_DOLLAR ||
    store.listSeriesCountries('ppp_conversion_factor').includes(code)
  );
};

const checkYear = (field: string, year: number): Result<number, ConfigError> =>
  year >= MIN_PROGRAMME_YEAR && year <= MAX_PROGRAMME_YEAR
    ? ok(year)
    : err(
        createConfigError(
          field,
          `${field} must be between ${String(MIN_PROGRAMME_YEAR)} and ${String(MAX_PROGRAMME_YEAR)}`
        )
      );

const resolveModule = (
  selection: ModuleSelection,
  index: number,
  templates: ModuleTemplates
): Result<ModuleConfig, ConfigError> => {
  if (typeof selection !== 'string') {
    return ok(selection);
  }

  const id = selection.trim();
  if (!isCostModuleKind(id)) {
    return err(createConfigError(`modules/${String(index)}`, `Unknown module identifier '${id}'`));
  }
  const template = templates.get(id);
  if (template === undefined) {
    return err(
      createConfigError(`modules/${String(index)}`, `Module '${id}' has no default template`)
    );
  }
  return ok(template);
};

interface PricedField {
  readonly path: string;
  readonly currency: string;
}

/**
 * Money given inside module items, with the field path it came from.
 */
const pricedFields = (config: ModuleConfig, field: string): PricedField[] => {
  switch (config.kind) {
    case 'media':
      return config.items.map((item, i) => ({
        path: `${field}/${String(i)}/unitCost/currency`,
        currency: item.unitCost.currency,
      }));
    case 'meetings':
      return config.items.flatMap((item, i) =>
        item.roomRatePerM2 === undefined
          ? []
          : [
              {
                path: `${field}/${String(i)}/roomRatePerM2/currency`,
                currency: item.roomRatePerM2.currency,
              },
            ]
      );
    case 'transport':
      return config.items.flatMap((item, i) =>
        item.fuelPricePerLitre === undefined
          ? []
          : [
              {
                path: `${field}/${String(i)}/fuelPricePerLitre/currency`,
                currency: item.fuelPricePerLitre.currency,
              },
            ]
      );
    default:
      return [];
  }
};

/**
 * Parameter checks the schema cannot express.
 */
const checkModule = (
  store: ReferenceDataStore,
  config: ModuleConfig,
  index: number
): Result<ModuleConfig, ConfigError> => {
  const field = `modules/${String(index)}/items`;

  if (config.kind === 'meetings') {
    const itemIndex = config.items.findIndex(
      (item) =>
        item.vehicleModel === undefined &&
        item.attendees.some((attendee) => attendee.travelling === true && attendee.count > 0)
    );
    if (itemIndex >= 0) {
      return err(
        createConfigError(
          `${field}/${String(itemIndex)}/vehicleModel`,
          'Travelling attendees need a vehicle model'
        )
      );
    }

    const unpricedRoom = config.items.findIndex(
      (item) => (item.roomSizeM2 ?? 0) > 0 && item.roomRatePerM2 === undefined
    );
    if (unpricedRoom >= 0) {
      return err(
        createConfigError(
          `${field}/${String(unpricedRoom)}/roomRatePerM2`,
          'A meeting room size needs a rate per square metre'
        )
      );
    }
  }

  const unknown = pricedFields(config, field).find(
    (priced) => !isKnownCurrency(store, priced.currency)
  );
  if (unknown !== undefined) {
    return err(createConfigError(unknown.path, `Unknown currency '${unknown.currency}'`));
  }

  return ok(config);
};

// ─────────────────────────────────────────────────────────────────────────────
// Resolution
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Merges the input over the defaults and validates it against the reference
 * snapshot: known country and currency, year range, discount rate, module
 * identifiers and their parameters.
 */
export const resolveProgrammeConfig = (
  deps: ResolveProgrammeConfigDeps,
  input: ProgrammeConfigInput
): Result<ProgrammeConfig, ConfigError> => {
  const { store, templates } = deps;

  const country = normalizeCountryCode(input.country ?? DEFAULT_PROGRAMME_INPUT.country);
  if (!store.listCountries().includes(country)) {
    return err(createConfigError('country', `Unknown country code '${country}'`));
  }

  const startYear = checkYear('start_year', input.start_year ?? DEFAULT_PROGRAMME_INPUT.start_year);
  if (startYear.isErr()) return err(startYear.error);
  const endYear = checkYear('end_year', input.end_year ?? DEFAULT_PROGRAMME_INPUT.end_year);
  if (endYear.isErr()) return err(endYear.error);
  if (startYear.value > endYear.value) {
    return err(createConfigError('end_year', 'end_year must not be before start_year'));
  }

  const desiredYear = checkYear(
    'desired_year',
    input.desired_year ?? DEFAULT_PROGRAMME_INPUT.desired_year
  );
  if (desiredYear.isErr()) return err(desiredYear.error);

  const discountRate = input.discount_rate ?? DEFAULT_PROGRAMME_INPUT.discount_rate;
  if (!Number.isFinite(discountRate) || discountRate < 0 || discountRate > 1) {
    return err(createConfigError('discount_rate', 'discount_rate must be between 0 and 1'));
  }

  const desiredCurrency = normalizeCurrencyCode(
    input.desired_currency ?? DEFAULT_PROGRAMME_INPUT.desired_currency
  );
  if (!isKnownCurrency(store, desiredCurrency)) {
    return err(createConfigError('desired_currency', `Unknown currency '${desiredCurrency}'`));
  }

  const selections = input.modules ?? DEFAULT_PROGRAMME_INPUT.modules;
  if (selections.length === 0) {
    return err(createConfigError('modules', 'At least one module is required'));
  }

  const modules: ModuleConfig[] = [];
  for (const [index, selection] of selections.entries()) {
    const resolved = resolveModule(selection, index, templates).andThen((config) =>
      checkModule(store, config, index)
    );
    if (resolved.isErr()) return err(resolved.error);
    modules.push(resolved.value);
  }

  return ok({
    country,
    startYear: startYear.value,
    endYear: endYear.value,
    discountRate: new Decimal(discountRate),
    desiredCurrency,
    desiredYear: desiredYear.value,
    modules,
  });
};
