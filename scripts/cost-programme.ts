#!/usr/bin/env node
/**
 * Cost a programme from the command line.
 *
 * Reads a JSON programme configuration, merges it over the defaults, and
 * writes the CSV ledger to a file, or to stdout for `-o -`. The reference
 * database comes from REFERENCE_DATABASE_URL, as for the server. Logs go to
 * stderr.
 *
 * Usage:
 *   npm run cost -- -i programme.json -o costs.csv
 *   npm run cost -- --input programme.json --output - --summary
 */

import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { parseArgs } from 'node:util';

import { loadReferenceData } from '../src/app/load-reference-data.js';
import { errorMessage } from '../src/common/types/errors.js';
import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';
import {
  makeCurrencyTimeRebaser,
  makePopulationResolver,
} from '../src/modules/normalization/index.js';
import {
  costProgrammeCsv,
  parseProgrammeConfigInput,
} from '../src/modules/programme-costing/index.js';

const USAGE = 'Usage: cost-programme -i <input.json> -o <output.csv|-> [--summary]';

const STDOUT = '-';

const parseCliArgs = (): { input: string; output: string; summary: boolean } => {
  const { values } = parseArgs({
    options: {
      input: { type: 'string', short: 'i' },
      output: { type: 'string', short: 'o' },
      summary: { type: 'boolean', default: false },
    },
  });

  if (values.input === undefined || values.output === undefined) {
    throw new Error(USAGE);
  }

  return {
    input: path.resolve(values.input),
    output: values.output === STDOUT ? STDOUT : path.resolve(values.output),
    summary: values.summary === true,
  };
};

const readJson = async (filePath: string): Promise<unknown> => {
  const contents = await readFile(filePath, 'utf8');
  return JSON.parse(contents);
};

const main = async (): Promise<void> => {
  const args = parseCliArgs();
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({
    level: config.logger.level,
    name: 'cost-programme',
    pretty: config.logger.pretty,
    destination: 'stderr',
  });

  const input = parseProgrammeConfigInput(await readJson(args.input));
  if (input.isErr()) {
    throw new Error(`Invalid programme configuration at ${input.error.field}: ${input.error.message}`);
  }

  const { store, templates } = await loadReferenceData(config, logger);

  const csv = costProgrammeCsv(
    {
      store,
      templates,
      rebaser: makeCurrencyTimeRebaser(store, {
        deflatorCountry: config.costing.deflatorCountry,
      }),
      population: makePopulationResolver(store),
    },
    input.value,
    { summary: args.summary }
  );

  if (csv.isErr()) {
    throw new Error(`${csv.error.type}: ${csv.error.message}`);
  }

  if (args.output === STDOUT) {
    process.stdout.write(csv.value);
  } else {
    await writeFile(args.output, csv.value, 'utf8');
  }
  logger.info({ output: args.output }, 'Programme ledger written');
};

await main().catch((error: unknown) => {
  console.error(errorMessage(error));
  process.exit(1);
});
