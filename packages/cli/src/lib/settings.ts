/**
 * Tool settings and settings loading for gwscfg
 */

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { isAbsolute, join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { BuilderError, ErrorCodes } from './errors.js';

export interface BuilderSettings {
  /** Catalog file written by gwsx extract */
  catalog?: string;
  /** Baseline markdown directory, used when no catalog is set */
  baselines?: string;
  format: 'yaml' | 'json';
  includeComments: boolean;
}

export const DEFAULT_SETTINGS: BuilderSettings = {
  format: 'yaml',
  includeComments: true,
};

export const SETTINGS_FILE_NAMES = [
  'gwscfg.config.yaml',
  'gwscfg.config.yml',
  'gwscfg.config.json',
  '.gwscfgrc',
  '.gwscfgrc.yaml',
  '.gwscfgrc.json',
];

export const SETTINGS_ENV = {
  CATALOG: 'GWSCFG_CATALOG',
  BASELINES: 'GWSCFG_BASELINES',
} as const;

const SettingsFileSchema = z
  .object({
    catalog: z.string().min(1).optional(),
    baselines: z.string().min(1).optional(),
    format: z.enum(['yaml', 'json']).optional(),
    includeComments: z.boolean().optional(),
  })
  .strict();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

export interface LoadedSettings {
  settings: BuilderSettings;
  /** Settings file in use, if any */
  source?: string;
}

function resolveFrom(directory: string, path: string): string {
  return isAbsolute(path) ? path : resolve(directory, path);
}

export function mergeSettings(base: BuilderSettings, override: SettingsFile): BuilderSettings {
  return {
    ...base,
    ...(override.catalog !== undefined ? { catalog: override.catalog } : {}),
    ...(override.baselines !== undefined ? { baselines: override.baselines } : {}),
    ...(override.format !== undefined ? { format: override.format } : {}),
    ...(override.includeComments !== undefined ? { includeComments: override.includeComments } : {}),
  };
}

async function readSettingsFile(path: string): Promise<SettingsFile> {
  let raw: unknown;
  try {
    const content = await readFile(path, 'utf-8');
    raw = path.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new BuilderError(ErrorCodes.CONFIG_INVALID, `Could not parse ${path}: ${cause.message}`, { cause });
  }

  // An empty file means "all defaults"
  if (raw === null || raw === undefined) {
    return {};
  }

  const parsed = SettingsFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new BuilderError(ErrorCodes.CONFIG_INVALID, `Invalid settings in ${path}`, {
      details: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }
  return parsed.data;
}

/**
 * Load settings from the first settings file in targetPath, then apply
 * environment overrides. Relative paths resolve against targetPath.
 */
export async function loadSettings(
  targetPath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<LoadedSettings> {
  const directory = resolve(targetPath);
  let settings: BuilderSettings = { ...DEFAULT_SETTINGS };
  let source: string | undefined;

  for (const fileName of SETTINGS_FILE_NAMES) {
    const settingsPath = join(directory, fileName);
    if (existsSync(settingsPath)) {
      settings = mergeSettings(settings, await readSettingsFile(settingsPath));
      source = settingsPath;
      break;
    }
  }

  const catalogOverride = env[SETTINGS_ENV.CATALOG];
  if (catalogOverride) settings.catalog = catalogOverride;
  const baselinesOverride = env[SETTINGS_ENV.BASELINES];
  if (baselinesOverride) settings.baselines = baselinesOverride;

  if (settings.catalog) settings.catalog = resolveFrom(directory, settings.catalog);
  if (settings.baselines) settings.baselines = resolveFrom(directory, settings.baselines);

  return source ? { settings, source } : { settings };
}
