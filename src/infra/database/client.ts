import { Kysely, PostgresDialect } from 'kysely';
import pg from 'pg';

import type { ReferenceDatabase } from './reference/types.js';

const { Pool: PG_POOL } = pg;

export type ReferenceDbClient = Kysely<ReferenceDatabase>;

/**
 * Create a Kysely instance for the reference database.
 *
 * The tables are read once at startup, so a small pool is enough.
 */
export const createReferenceDbClient = (connectionString: string): ReferenceDbClient => {
  return new Kysely<ReferenceDatabase>({
    dialect: new PostgresDialect({
      pool: new PG_POOL({
        connectionString,
        max: 2,
      }),
    }),
  });
};

export type * from './reference/types.js';
