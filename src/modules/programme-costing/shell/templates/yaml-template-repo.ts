import fs from 'node:fs/promises';
import path from 'node:path';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { err, ok, type Result } from 'neverthrow';
import { parse as parseYaml } from 'yaml';

import { errorMessage } from '@/common/types/errors.js';
import {
  COST_MODULE_KINDS,
  ModuleConfigSchema,
  type CostModuleKind,
  type ModuleConfig,
} from '@/modules/cost-modules/index.js';

import type { ModuleTemplates } from '../../core/types.js';

const validator = TypeCompiler.Compile(ModuleConfigSchema);

export type TemplateLoadError =
  | { type: 'ReadError'; message: string }
  | { type: 'ParseError'; message: string }
  | { type: 'SchemaValidationError'; message: string; details: string[] }
  | { type: 'KindMismatch'; message: string; expected: CostModuleKind; actual: string };

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * Reads `<kind>.yaml`. A missing file means the module has no template.
 */
const readTemplate = async (
  filePath: string,
  kind: CostModuleKind
): Promise<Result<ModuleConfig | null, TemplateLoadError>> => {
  let contents: string;
  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return ok(null);
    }
    return err({
      type: 'ReadError',
      message: `Failed to read module template at ${filePath}: ${errorMessage(error)}`,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(contents);
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse YAML at ${filePath}: ${errorMessage(error)}`,
    });
  }

  if (!validator.Check(parsed)) {
    const details = [...validator.Errors(parsed)].map((e) => `${e.path}: ${e.message}`);
    return err({
      type: 'SchemaValidationError',
      message: `Schema validation failed for ${filePath}`,
      details,
    });
  }

  if (parsed.kind !== kind) {
    return err({
      type: 'KindMismatch',
      message: `${filePath} declares kind '${parsed.kind}', expected '${kind}'`,
      expected: kind,
      actual: parsed.kind,
    });
  }

  return ok(parsed);
};

/**
 * Loads the default module templates from a directory of `<kind>.yaml` files.
 */
export const loadModuleTemplates = async (
  templatesDir: string
): Promise<Result<ModuleTemplates, TemplateLoadError>> => {
  const templates = new Map<CostModuleKind, ModuleConfig>();

  for (const kind of COST_MODULE_KINDS) {
    const result = await readTemplate(path.join(templatesDir, `${kind}.yaml`), kind);
    if (result.isErr()) {
      return err(result.error);
    }
    if (result.value !== null) {
      templates.set(kind, result.value);
    }
  }

  return ok(templates);
};
