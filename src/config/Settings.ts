/**
 * Settings file
 *
 * One schema, one validation pass at load time. Every option has its own default,
 * so a partial file (or no file at all) is valid.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ErrorCode, QuestCastError } from '../types/Errors';

export const MirrorConfigSchema = z.object({
  renderDriver: z.enum(['opengl', 'software', 'direct3d']).default('opengl'),
  /** width:height:x:y */
  crop: z
    .string()
    .regex(/^\d+:\d+:\d+:\d+$/, 'crop must be width:height:x:y')
    .default('1600:900:2017:510'),
  bitrate: z
    .string()
    .regex(/^\d+[KM]?$/, 'bitrate must look like 4M, 8000K or 4000000')
    .default('4M'),
  maxSize: z.number().int().min(240).max(2160).default(1024),
  videoCodec: z.enum(['h264', 'h265', 'av1']).default('h264'),
  videoEncoder: z.string().min(1).default('OMX.qcom.video.encoder.avc'),
  noAudio: z.boolean().default(true),
  noControl: z.boolean().default(true),
});

export const SettingsSchema = z.object({
  pollIntervalMs: z.number().int().min(500).max(10000).default(2000),
  commandTimeoutMs: z.number().int().min(1000).max(30000).default(4000),
  wirelessTimeoutMs: z.number().int().min(1000).max(60000).default(10000),
  settleDelayMs: z.number().int().min(0).max(10000).default(1000),
  wirelessPort: z.coerce.number().int().min(1024).max(65535).default(5555),
  maxAuthorizationAttempts: z.number().int().positive().optional(),
  adbPath: z.string().optional(),
  scrcpyPath: z.string().optional(),
  language: z.enum(['en', 'he']).default('en'),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  statusColors: z.record(z.string()).default({
    wifi: 'green',
    device: 'green',
    unauthorized: 'yellow',
    offline: 'red',
    '': 'red',
  }),
  mirror: MirrorConfigSchema.default({}),
});

export type MirrorConfig = z.infer<typeof MirrorConfigSchema>;
export type Settings = z.infer<typeof SettingsSchema>;
export type SettingsInput = z.input<typeof SettingsSchema>;

export const DEFAULT_SETTINGS_PATH = path.join(os.homedir(), '.quest-cast', 'settings.json');

/**
 * Settings file path: explicit argument, then QUEST_CAST_CONFIG, then the default
 */
export function getSettingsPath(customPath?: string): string {
  return customPath || process.env.QUEST_CAST_CONFIG || DEFAULT_SETTINGS_PATH;
}

/**
 * Validate raw settings and fill in defaults
 */
export function parseSettings(raw: unknown, source = 'settings'): Settings {
  const result = SettingsSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new QuestCastError(ErrorCode.CONFIG_INVALID, `Invalid ${source}`, issues);
  }
  return result.data;
}

export function getDefaultSettings(): Settings {
  return parseSettings({});
}

/**
 * Load settings once at startup. A missing file yields the defaults.
 */
export function loadSettings(configPath?: string): Settings {
  const filePath = getSettingsPath(configPath);

  if (!fs.existsSync(filePath)) {
    return getDefaultSettings();
  }

  const text = fs.readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new QuestCastError(
      ErrorCode.CONFIG_INVALID,
      `Invalid settings file: ${filePath}`,
      error instanceof Error ? error.message : String(error),
      { cause: error }
    );
  }

  return parseSettings(raw, `settings file: ${filePath}`);
}

/**
 * Write settings as pretty-printed JSON, creating the directory if needed
 */
export function saveSettings(settings: Settings, configPath?: string): string {
  const filePath = getSettingsPath(configPath);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(settings, null, 2) + '\n', 'utf-8');
  return filePath;
}
