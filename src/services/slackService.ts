import axios, { type AxiosInstance } from 'axios';
import { errorMessage, NotificationError } from '../types/errors';
import type { Notifier, PowerStateNotice } from '../types';
import { componentLogger, type Logger } from '../utils/logger';

const SLACK_API_URL = 'https://slack.com/api';
const REQUEST_TIMEOUT_MS = 10_000;

interface PostMessageResponse {
  ok: boolean;
  error?: string;
}

function formatUtc(time: Date): string {
  return `${time.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function formatPowerStateMessage(notice: PowerStateNotice): string {
  const emoji = notice.action === 'start' ? '🟢' : '🔴';
  const actionText = notice.action === 'start' ? 'started' : 'stopped';
  return [
    `${emoji} *EC2 Instance Power State Change*`,
    '',
    `*Instance:* ${notice.instanceName}`,
    `*Instance ID:* \`${notice.instanceId}\``,
    `*Action:* ${actionText}`,
    `*Region:* ${notice.region}`,
    `*Time:* ${formatUtc(notice.time)}`,
  ].join('\n');
}

/** Sends direct messages through the Slack Web API. */
export class SlackService implements Notifier {
  constructor(
    private readonly botToken: string,
    private readonly http: AxiosInstance = axios.create({
      baseURL: SLACK_API_URL,
      timeout: REQUEST_TIMEOUT_MS,
    })
  ) {}

  async notify(recipient: string, notice: PowerStateNotice): Promise<void> {
    let data: PostMessageResponse;
    try {
      const response = await this.http.post<PostMessageResponse>('/chat.postMessage', {
        channel: recipient,
        text: formatPowerStateMessage(notice),
      }, {
        headers: { Authorization: `Bearer ${this.botToken}` },
      });
      data = response.data;
    } catch (error) {
      throw new NotificationError(recipient, errorMessage(error));
    }

    if (!data.ok) {
      throw new NotificationError(recipient, data.error ?? 'unknown Slack error');
    }
  }
}

export interface NotifySummary {
  delivered: number;
  failed: number;
}

/**
 * Notifies every stakeholder in order. Failures are logged per recipient and
 * never interrupt the remaining deliveries.
 */
export async function notifyStakeholders(
  notifier: Notifier,
  stakeholders: readonly string[],
  notice: PowerStateNotice,
  log: Logger = componentLogger('stakeholder_notification')
): Promise<NotifySummary> {
  const fields = {
    instanceName: notice.instanceName,
    instanceId: notice.instanceId,
    action: notice.action,
  };

  if (stakeholders.length === 0) {
    log.debug({ ...fields, stakeholdersCount: 0 }, `No stakeholders to notify for instance ${notice.instanceName}`);
    return { delivered: 0, failed: 0 };
  }

  log.info(
    { ...fields, stakeholdersCount: stakeholders.length, stakeholders },
    `Notifying ${stakeholders.length} stakeholders about ${notice.action} action on ${notice.instanceName}`
  );

  const summary: NotifySummary = { delivered: 0, failed: 0 };
  for (const recipient of stakeholders) {
    try {
      await notifier.notify(recipient, notice);
      summary.delivered++;
      log.info(
        { ...fields, recipient, status: 'success' },
        `Sent notification to ${recipient} for ${notice.action} action on ${notice.instanceName}`
      );
    } catch (error) {
      summary.failed++;
      log.error(
        { ...fields, recipient, status: 'error', error: errorMessage(error) },
        `Failed to send notification to ${recipient}`
      );
    }
  }
  return summary;
}
