import * as fs from 'fs';
import { z } from 'zod';
import { LOG_LEVELS } from './logger';
import { DEFAULT_STROKE_STYLE } from './svgStyler';
import { SettingsError, errorMessage } from './errors';

export const SettingsSchema = z.object({
  inkscapePath: z.string().trim().min(1).default('inkscape'),
  inkscapeCli: z.enum(['legacy', 'modern']).default('legacy'),
  strokeColor: z
    .string()
    .trim()
    .min(1)
    .regex(/^[^;]+$/, 'must not contain ";"')
    .default(DEFAULT_STROKE_STYLE.color),
  strokeWidth: z.coerce.number().positive().finite().default(DEFAULT_STROKE_STYLE.width),
  checkExitCode: z.boolean().default(true),
  logLevel: z.enum(LOG_LEVELS).default('info'),
});

export type Settings = z.infer<typeof SettingsSchema>;

export const ENV_KEYS = {
  inkscapePath: 'LASERPREP_INKSCAPE',
  inkscapeCli: 'LASERPREP_INKSCAPE_CLI',
  strokeColor: 'LASERPREP_STROKE_COLOR',
  strokeWidth: 'LASERPREP_STROKE_WIDTH',
  checkExitCode: 'LASERPREP_CHECK_EXIT_CODE',
  logLevel: 'LASERPREP_LOG_LEVEL',
} as const satisfies Record<keyof Settings, string>;

export type SettingsSources = {
  /** JSON settings file; a missing file is an error only when one was named. */
  file?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<Record<keyof Settings, unknown>>;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const withoutUndefined = (values: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));

function readSettingsFile(filePath: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error: unknown) {
    throw new SettingsError(`Failed to read settings file ${filePath}: ${errorMessage(error)}`, { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new SettingsError(`Settings file ${filePath} must contain a JSON object`);
  }
  return parsed;
}

function parseBoolean(name: string, raw: string | undefined): boolean | undefined {
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = raw.trim().toLowerCase();
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new SettingsError(`Invalid boolean for ${name}: "${raw}"`);
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const pick = (name: string) => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };
  return withoutUndefined({
    inkscapePath: pick(ENV_KEYS.inkscapePath),
    inkscapeCli: pick(ENV_KEYS.inkscapeCli),
    strokeColor: pick(ENV_KEYS.strokeColor),
    strokeWidth: pick(ENV_KEYS.strokeWidth),
    checkExitCode: parseBoolean(ENV_KEYS.checkExitCode, env[ENV_KEYS.checkExitCode]),
    logLevel: pick(ENV_KEYS.logLevel),
  });
}

/** Defaults, then the settings file, then the environment, then explicit overrides. */
export function loadSettings({ file, env = {}, overrides = {} }: SettingsSources = {}): Settings {
  const merged = {
    ...(file ? readSettingsFile(file) : {}),
    ...readEnv(env),
    ...withoutUndefined(overrides),
  };

  const result = SettingsSchema.safeParse(merged);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new SettingsError(`Invalid settings: ${details}`);
  }
  return result.data;
}
