/**
 * Registry loading.
 *
 * Templates, resource profiles, scoring weights and analyzer keyword tables
 * live as YAML under a config directory:
 *
 *   config/
 *     phases/*.yaml     one phase template per file
 *     tasks/*.yaml      one phase type (task template list) per file
 *     profiles.yaml     resource profiles, in declaration order
 *     scoring.yaml      assignment/priority weights and task multipliers
 *     analysis.yaml     analyzer keyword tables
 *
 * Everything is read and validated once, then handed to the pipeline as a
 * frozen `Registries` value. Any problem is a ConfigurationError naming the file.
 */

import { readFile } from 'node:fs/promises';
import { join, relative } from 'node:path';
import { fileURLToPath } from 'node:url';
import { glob } from 'glob';
import { parse } from 'yaml';
import type { ZodType, ZodTypeDef } from 'zod';
import {
  AnalysisKeywordsSchema,
  PhaseTemplateSchema,
  PhaseTypeTemplateSchema,
  ProfileRegistryFileSchema,
  ScoringWeightsSchema,
  type PhaseTemplate,
  type PhaseTypeTemplate,
  type Registries,
} from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * The config directory shipped with the package
 */
export const DEFAULT_CONFIG_DIR = fileURLToPath(new URL('../../config/', import.meta.url));

/**
 * Template used when the analysis names no known domain
 */
export const DEFAULT_TEMPLATE = 'default';

export interface LoadRegistriesOptions {
  /** Directory holding the registry files (default: STRATEGOS_CONFIG_DIR or the packaged config) */
  configDir?: string | undefined;
}

export function resolveConfigDir(configDir?: string): string {
  return configDir ?? process.env.STRATEGOS_CONFIG_DIR ?? DEFAULT_CONFIG_DIR;
}

async function readYamlFile<Output, Input>(
  configDir: string,
  path: string,
  schema: ZodType<Output, ZodTypeDef, Input>
): Promise<Output> {
  const file = relative(configDir, path);

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Registry file not readable: ${file}`, { file }, error);
  }

  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid YAML in ${file}: ${reason}`, { file }, error);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigurationError(
      `Malformed registry ${file}: ${issues.map((i) => `${i.path || '(root)'}: ${i.message}`).join('; ')}`,
      { file, issues }
    );
  }
  return result.data;
}

async function listYamlFiles(configDir: string, subdirectory: string): Promise<string[]> {
  const files = await glob(`${subdirectory}/*.{yaml,yml}`, { cwd: configDir, nodir: true, absolute: true });
  // glob returns filesystem order
  return files.sort();
}

function indexTemplates(templates: PhaseTemplate[]): {
  phaseTemplates: Record<string, PhaseTemplate>;
  domainIndex: Record<string, string>;
} {
  const phaseTemplates: Record<string, PhaseTemplate> = {};
  const domainIndex: Record<string, string> = {};

  for (const template of templates) {
    if (phaseTemplates[template.name]) {
      throw new ConfigurationError(`Duplicate phase template: ${template.name}`, { template: template.name });
    }
    phaseTemplates[template.name] = template;

    for (const domain of [template.name, ...template.domains]) {
      const key = domain.toLowerCase();
      const owner = domainIndex[key];
      if (owner !== undefined && owner !== template.name) {
        throw new ConfigurationError(
          `Domain '${domain}' is claimed by templates '${owner}' and '${template.name}'`,
          { domain, templates: [owner, template.name] }
        );
      }
      domainIndex[key] = template.name;
    }
  }

  if (!phaseTemplates[DEFAULT_TEMPLATE]) {
    throw new ConfigurationError(`Phase template registry has no '${DEFAULT_TEMPLATE}' template`);
  }

  return { phaseTemplates, domainIndex };
}

function checkPhaseTypes(phaseTypes: PhaseTypeTemplate[]): void {
  const seenTypes = new Set<string>();
  const aliasOwner = new Map<string, string>();

  for (const phaseType of phaseTypes) {
    if (seenTypes.has(phaseType.phaseType)) {
      throw new ConfigurationError(`Duplicate phase type: ${phaseType.phaseType}`, { phaseType: phaseType.phaseType });
    }
    seenTypes.add(phaseType.phaseType);

    for (const alias of phaseType.aliases) {
      const key = alias.toLowerCase();
      const owner = aliasOwner.get(key);
      if (owner !== undefined) {
        throw new ConfigurationError(
          `Phase name alias '${alias}' is claimed by phase types '${owner}' and '${phaseType.phaseType}'`,
          { alias, phaseTypes: [owner, phaseType.phaseType] }
        );
      }
      aliasOwner.set(key, phaseType.phaseType);
    }

    const suffixes = new Set<string>();
    for (const task of phaseType.tasks) {
      if (suffixes.has(task.idSuffix)) {
        throw new ConfigurationError(
          `Duplicate task suffix '${task.idSuffix}' in phase type '${phaseType.phaseType}'`,
          { phaseType: phaseType.phaseType, idSuffix: task.idSuffix }
        );
      }
      suffixes.add(task.idSuffix);
    }
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Load and validate every registry under the config directory.
 */
export async function loadRegistries(options: LoadRegistriesOptions = {}): Promise<Registries> {
  const configDir = resolveConfigDir(options.configDir);

  const phaseFiles = await listYamlFiles(configDir, 'phases');
  const taskFiles = await listYamlFiles(configDir, 'tasks');
  if (phaseFiles.length === 0) {
    throw new ConfigurationError(`No phase templates found under ${join(configDir, 'phases')}`, { configDir });
  }
  if (taskFiles.length === 0) {
    throw new ConfigurationError(`No task templates found under ${join(configDir, 'tasks')}`, { configDir });
  }

  const templates = await Promise.all(
    phaseFiles.map((file) => readYamlFile(configDir, file, PhaseTemplateSchema))
  );
  const phaseTypes = await Promise.all(
    taskFiles.map((file) => readYamlFile(configDir, file, PhaseTypeTemplateSchema))
  );
  const [profileFile, weights, analysis] = await Promise.all([
    readYamlFile(configDir, join(configDir, 'profiles.yaml'), ProfileRegistryFileSchema),
    readYamlFile(configDir, join(configDir, 'scoring.yaml'), ScoringWeightsSchema),
    readYamlFile(configDir, join(configDir, 'analysis.yaml'), AnalysisKeywordsSchema),
  ]);

  const { phaseTemplates, domainIndex } = indexTemplates(templates);
  checkPhaseTypes(phaseTypes);

  const profileNames = new Set<string>();
  for (const profile of profileFile.profiles) {
    if (profileNames.has(profile.name)) {
      throw new ConfigurationError(`Duplicate resource profile: ${profile.name}`, { profile: profile.name });
    }
    profileNames.add(profile.name);
  }

  logger.debug('Registries loaded', undefined, {
    configDir,
    templates: Object.keys(phaseTemplates).length,
    phaseTypes: phaseTypes.length,
    profiles: profileFile.profiles.length,
  });

  return deepFreeze({
    phaseTemplates,
    domainIndex,
    phaseTypes,
    profiles: profileFile.profiles,
    weights,
    analysis,
  });
}
