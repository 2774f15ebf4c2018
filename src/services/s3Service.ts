import { S3Client, GetObjectCommand } from '@aws-sdk/client-s3';
import { parseSettings } from '../config';
import { ConfigError, errorMessage } from '../types/errors';
import type { SchedulerSettings } from '../types';
import { componentLogger } from '../utils/logger';

const log = componentLogger('settings');

export class S3Service {
  private client: S3Client;

  constructor(region: string = 'us-east-1') {
    this.client = new S3Client({ region });
  }

  async getSettings(bucket: string, key: string): Promise<SchedulerSettings> {
    log.info({ bucket, key }, `Loading settings from s3://${bucket}/${key}`);

    let bodyString: string | undefined;
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      bodyString = await response.Body?.transformToString();
    } catch (error) {
      throw new ConfigError([`s3://${bucket}/${key} could not be read: ${errorMessage(error)}`]);
    }

    if (!bodyString) {
      throw new ConfigError([`s3://${bucket}/${key} is empty`]);
    }

    let document: unknown;
    try {
      document = JSON.parse(bodyString);
    } catch (error) {
      throw new ConfigError([`s3://${bucket}/${key} is not valid JSON: ${errorMessage(error)}`]);
    }

    const settings = parseSettings(document);
    log.info(
      { bucket, key, regions: settings.regions?.length ?? 0, regionTimezones: Object.keys(settings.regionTimezones ?? {}).length },
      'Loaded scheduler settings'
    );
    return settings;
  }
}
