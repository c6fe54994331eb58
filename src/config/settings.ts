import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { GlobalSettings, OrientationSettings } from '../types';
import { ConfigError } from '../utils/errors';

export const DEFAULT_CONFIG_FILE = 'config.json';

const PathSchema = z.string().trim().min(1);
const MarginSchema = z.number().int().min(0);
const ScaleFactorSchema = z.number().positive().max(4);

// Key names follow the JSON file on disk
export const ConfigFileSchema = z.object({
  'input-path': PathSchema,
  'output-path': PathSchema,
  debug: z.boolean().default(false),
  'rotate-to-landscape': z.boolean().default(false),

  'land-frame-path': PathSchema,
  'land-crop-left': MarginSchema,
  'land-crop-top': MarginSchema,
  'land-crop-right': MarginSchema,
  'land-crop-bottom': MarginSchema,
  'land-scale-factor': ScaleFactorSchema.default(1),

  'port-frame-path': PathSchema,
  'port-crop-left': MarginSchema,
  'port-crop-top': MarginSchema,
  'port-crop-right': MarginSchema,
  'port-crop-bottom': MarginSchema,
  'port-scale-factor': ScaleFactorSchema.default(1),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Command-line values that take precedence over the file. */
export interface SettingsOverrides {
  input?: string;
  output?: string;
  landscapeFrame?: string;
  portraitFrame?: string;
  debug?: boolean;
}

function freezeSide(side: OrientationSettings): OrientationSettings {
  return Object.freeze({ ...side, margins: Object.freeze({ ...side.margins }) });
}

export function buildSettings(raw: unknown, overrides: SettingsOverrides = {}): GlobalSettings {
  const parsed = ConfigFileSchema.safeParse(raw);

  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }

  const file = parsed.data;

  return Object.freeze({
    inputPath: overrides.input ?? file['input-path'],
    outputPath: overrides.output ?? file['output-path'],
    debug: overrides.debug === true || file.debug,
    rotateToLandscape: file['rotate-to-landscape'],
    landscape: freezeSide({
      framePath: overrides.landscapeFrame ?? file['land-frame-path'],
      margins: {
        left: file['land-crop-left'],
        top: file['land-crop-top'],
        right: file['land-crop-right'],
        bottom: file['land-crop-bottom'],
      },
      scaleFactor: file['land-scale-factor'],
    }),
    portrait: freezeSide({
      framePath: overrides.portraitFrame ?? file['port-frame-path'],
      margins: {
        left: file['port-crop-left'],
        top: file['port-crop-top'],
        right: file['port-crop-right'],
        bottom: file['port-crop-bottom'],
      },
      scaleFactor: file['port-scale-factor'],
    }),
  });
}

export function resolveConfigPath(explicit?: string): string {
  return path.resolve(explicit || process.env.MAGNET_FRAMER_CONFIG || DEFAULT_CONFIG_FILE);
}

export async function loadSettings(
  configPath: string,
  overrides: SettingsOverrides = {}
): Promise<GlobalSettings> {
  let contents: string;
  try {
    contents = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${configPath}: ${error}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new ConfigError(`Configuration file ${configPath} is not valid JSON: ${error}`);
  }

  return buildSettings(raw, overrides);
}
