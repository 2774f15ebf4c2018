import { applySettings, loadConfig, type SchedulerConfig } from './config';
import { EC2Service } from './services/ec2Service';
import { PowerScheduler } from './services/powerScheduler';
import { Reconciler } from './services/reconciler';
import { S3Service } from './services/s3Service';
import { SlackService } from './services/slackService';
import { TimezoneResolver } from './services/timezoneResolver';
import { componentLogger } from './utils/logger';

const log = componentLogger('scheduler_start');

export async function resolveConfig(env: NodeJS.ProcessEnv = process.env): Promise<SchedulerConfig> {
  const config = loadConfig(env);
  if (!config.settingsLocation) {
    return config;
  }
  const { bucket, key } = config.settingsLocation;
  const settings = await new S3Service(config.homeRegion).getSettings(bucket, key);
  return applySettings(config, settings);
}

export function createScheduler(config: SchedulerConfig): PowerScheduler {
  if (!config.slackBotToken) {
    log.warn(
      { notificationsEnabled: false },
      'SLACK_BOT_TOKEN environment variable not set - stakeholder notifications will be disabled'
    );
  }

  return new PowerScheduler({
    gateway: new EC2Service(),
    reconciler: new Reconciler({
      resolver: new TimezoneResolver(config.fallbackTimezone, config.regionTimezones),
      actOnFallbackTimezone: config.actOnFallbackTimezone,
    }),
    regions: config.regions,
    notifier: config.slackBotToken ? new SlackService(config.slackBotToken) : undefined,
  });
}
