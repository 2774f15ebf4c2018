import { z } from 'zod';
import { isValidTimezone } from '../services/timezoneResolver';
import { ConfigError } from '../types/errors';
import type { SchedulerSettings } from '../types';

const timezone = z.string().min(1).refine(isValidTimezone, { message: 'is not a valid IANA timezone' });

const regionList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((region) => region.trim())
      .filter((region) => region.length > 0)
  )
  .pipe(z.array(z.string()).min(1, 'must name at least one region'));

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const envSchema = z.object({
  AWS_REGION: z.string().min(1).default('us-west-2'),
  SCHEDULER_REGIONS: regionList.optional(),
  FALLBACK_TIMEZONE: timezone.default('UTC'),
  ACT_ON_FALLBACK_TIMEZONE: booleanFlag.default('true'),
  SLACK_BOT_TOKEN: z.string().min(1).optional(),
  CONFIG_BUCKET: z.string().min(1).optional(),
  CONFIG_KEY: z.string().min(1).default('config/settings.json'),
});

export const settingsSchema = z
  .object({
    regions: z.array(z.string().min(1)).min(1).optional(),
    fallbackTimezone: timezone.optional(),
    actOnFallbackTimezone: z.boolean().optional(),
    regionTimezones: z.record(z.string().min(1), timezone).optional(),
  })
  .strict();

export interface SchedulerConfig {
  regions: string[];
  fallbackTimezone: string;
  actOnFallbackTimezone: boolean;
  regionTimezones: Record<string, string>;
  slackBotToken?: string;
  /** Region used for S3 and other account-level calls. */
  homeRegion: string;
  settingsLocation?: { bucket: string; key: string };
}

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || 'value'} ${issue.message}`);
}

/** Reads scheduler configuration from environment variables. Empty strings count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SchedulerConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(describeIssues(parsed.error));
  }

  const vars = parsed.data;
  return {
    regions: vars.SCHEDULER_REGIONS ?? [vars.AWS_REGION],
    fallbackTimezone: vars.FALLBACK_TIMEZONE,
    actOnFallbackTimezone: vars.ACT_ON_FALLBACK_TIMEZONE,
    regionTimezones: {},
    slackBotToken: vars.SLACK_BOT_TOKEN,
    homeRegion: vars.AWS_REGION,
    settingsLocation: vars.CONFIG_BUCKET ? { bucket: vars.CONFIG_BUCKET, key: vars.CONFIG_KEY } : undefined,
  };
}

export function parseSettings(raw: unknown): SchedulerSettings {
  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(describeIssues(parsed.error));
  }
  return parsed.data;
}

/** Settings document values win over environment defaults. */
export function applySettings(config: SchedulerConfig, settings: SchedulerSettings): SchedulerConfig {
  return {
    ...config,
    regions: settings.regions ?? config.regions,
    fallbackTimezone: settings.fallbackTimezone ?? config.fallbackTimezone,
    actOnFallbackTimezone: settings.actOnFallbackTimezone ?? config.actOnFallbackTimezone,
    regionTimezones: { ...config.regionTimezones, ...settings.regionTimezones },
  };
}
