import { err, ok, type Result } from 'neverthrow';

import { createDatabaseError, errorMessage } from '@/common/types/errors.js';

import {
  toAdministrativeDivisionRecord,
  toDistanceRecord,
  toEconomicSeriesRecord,
  toHealthcareFacilityRecord,
  toPerDiemRecord,
  toPopulationRecord,
  toSalaryRecord,
  toSupplyRecord,
  toTransportRecord,
} from './row-mappers.js';
import { POPULATION_VARIANT } from '../../core/snapshot.js';

import type { ReferenceLoadError } from '../../core/errors.js';
import type { ReferenceDataLoader } from '../../core/ports.js';
import type { ReferenceTableName, ReferenceTables } from '../../core/types.js';
import type { ReferenceDbClient } from '@/infra/database/client.js';
import type { Logger } from 'pino';

export interface KyselyReferenceLoaderDeps {
  db: ReferenceDbClient;
  logger?: Logger;
}

/**
 * Maps rows, dropping those a mapper rejects and counting them.
 */
const mapRows = <TRow, TRecord>(
  rows: readonly TRow[],
  mapper: (row: TRow) => TRecord | null,
  table: ReferenceTableName,
  skipped: Map<ReferenceTableName, number>
): TRecord[] => {
  const records: TRecord[] = [];
  for (const row of rows) {
    const record = mapper(row);
    if (record === null) {
      skipped.set(table, (skipped.get(table) ?? 0) + 1);
    } else {
      records.push(record);
    }
  }
  return records;
};

/**
 * Kysely-based reference loader.
 *
 * Reads every reference table in full; the engine then queries the in-memory
 * snapshot. The tables keep the column names of the published price database.
 */
export class KyselyReferenceLoader implements ReferenceDataLoader {
  constructor(
    private readonly db: ReferenceDbClient,
    private readonly logger?: Logger
  ) {}

  async load(): Promise<Result<ReferenceTables, ReferenceLoadError>> {
    try {
      const [
        salaries,
        perDiems,
        transport,
        supplies,
        distances,
        divisions,
        facilities,
        economicStatistics,
        population,
      ] = await Promise.all([
        this.db.selectFrom('costs_salaries').selectAll().execute(),
        this.db.selectFrom('costs_per_diems').selectAll().execute(),
        this.db.selectFrom('costs_transport').selectAll().execute(),
        this.db.selectFrom('office_supplies_and_furniture').selectAll().execute(),
        this.db.selectFrom('distance_between_regions').selectAll().execute(),
        this.db.selectFrom('administrative_divisions').selectAll().execute(),
        this.db.selectFrom('healthcare_facilities').selectAll().execute(),
        this.db.selectFrom('economic_statistics').selectAll().execute(),
        this.db
          .selectFrom('population')
          .selectAll()
          .where('Variant', '=', POPULATION_VARIANT)
          .execute(),
      ]);

      const skipped = new Map<ReferenceTableName, number>();
      const tables: ReferenceTables = {
        salaries: mapRows(salaries, toSalaryRecord, 'salaries', skipped),
        perDiems: mapRows(perDiems, toPerDiemRecord, 'per_diems', skipped),
        transport: mapRows(transport, toTransportRecord, 'transport', skipped),
        supplies: mapRows(supplies, toSupplyRecord, 'supplies', skipped),
        distances: mapRows(distances, toDistanceRecord, 'distances', skipped),
        administrativeDivisions: mapRows(
          divisions,
          toAdministrativeDivisionRecord,
          'administrative_divisions',
          skipped
        ),
        healthcareFacilities: facilities.map(toHealthcareFacilityRecord),
        // Rows of series the engine does not use are dropped without counting
        economicSeries: economicStatistics.flatMap((row) => {
          const record = toEconomicSeriesRecord(row);
          return record !== null ? [record] : [];
        }),
        population: mapRows(population, toPopulationRecord, 'population', skipped),
      };

      for (const [table, count] of skipped) {
        this.logger?.warn({ table, count }, 'Skipped reference rows with missing values');
      }

      return ok(tables);
    } catch (error) {
      return err(
        createDatabaseError(`Failed to load reference tables: ${errorMessage(error)}`, error)
      );
    }
  }
}

export const makeKyselyReferenceLoader = (deps: KyselyReferenceLoaderDeps): ReferenceDataLoader =>
  new KyselyReferenceLoader(deps.db, deps.logger);
