/**
 * Startup loading shared by the HTTP server and the CLI: reference snapshot
 * from the database, module templates from YAML.
 */

import { createReferenceDbClient } from '../infra/database/client.js';
import { createChildLogger } from '../infra/logger/index.js';
import {
  loadModuleTemplates,
  type ModuleTemplates,
} from '../modules/programme-costing/index.js';
import {
  createReferenceSnapshot,
  makeKyselyReferenceLoader,
  type ReferenceDataStore,
} from '../modules/reference-data/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { Logger } from 'pino';

export interface LoadedReferenceData {
  store: ReferenceDataStore;
  templates: ModuleTemplates;
}

/**
 * Loads everything a costing run reads. Throws on failure: nothing can be
 * costed without it.
 */
export const loadReferenceData = async (
  config: AppConfig,
  parentLogger: Logger
): Promise<LoadedReferenceData> => {
  const logger = createChildLogger(parentLogger, { component: 'reference-data' });
  const db = createReferenceDbClient(config.referenceData.url);

  try {
    const tables = await makeKyselyReferenceLoader({ db, logger }).load();
    if (tables.isErr()) {
      throw new Error(tables.error.message, { cause: tables.error.cause });
    }

    const { store, warnings } = createReferenceSnapshot(tables.value);
    for (const warning of warnings) {
      logger.warn({ table: warning.table, key: warning.key }, warning.message);
    }
    logger.info({ rows: store.stats() }, 'Reference snapshot loaded');

    const templates = await loadModuleTemplates(config.referenceData.templatesDir);
    if (templates.isErr()) {
      throw new Error(templates.error.message);
    }
    logger.info({ modules: [...templates.value.keys()] }, 'Module templates loaded');

    return { store, templates: templates.value };
  } finally {
    // The snapshot lives in memory; the connection is not needed afterwards
    await db.destroy();
  }
};
