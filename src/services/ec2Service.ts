import {
  EC2Client,
  StartInstancesCommand,
  StopInstancesCommand,
  DescribeInstancesCommand,
  InstanceStateName,
  type Instance,
  type Tag,
} from '@aws-sdk/client-ec2';
import { errorMessage, InstanceListingError } from '../types/errors';
import type { InstanceGateway, InstanceSnapshot, ObservedState, PowerActionResult } from '../types';
import { componentLogger, type Logger } from '../utils/logger';
import { parseStakeholders, TAG_KEYS } from './scheduleParser';

export interface EC2ServiceOptions {
  maxRetries?: number;
  retryDelayMs?: number;
  log?: Logger;
}

const LISTED_STATES: string[] = [
  InstanceStateName.pending,
  InstanceStateName.running,
  InstanceStateName.stopping,
  InstanceStateName.stopped,
];

function toObservedState(name: string | undefined): ObservedState {
  switch (name) {
    case InstanceStateName.running:
      return 'running';
    case InstanceStateName.stopped:
      return 'stopped';
    case InstanceStateName.pending:
      return 'pending';
    case InstanceStateName.stopping:
      return 'stopping';
    default:
      return 'other';
  }
}

function tagMap(tags: Tag[] | undefined): Map<string, string> {
  const map = new Map<string, string>();
  for (const tag of tags ?? []) {
    if (tag.Key !== undefined && tag.Value !== undefined) {
      map.set(tag.Key, tag.Value);
    }
  }
  return map;
}

export function toSnapshot(instance: Instance, region: string): InstanceSnapshot | undefined {
  const id = instance.InstanceId;
  if (!id) {
    return undefined;
  }
  const tags = tagMap(instance.Tags);
  return {
    id,
    name: tags.get(TAG_KEYS.name) ?? id,
    region,
    currentState: toObservedState(instance.State?.Name),
    schedule: {
      onTime: tags.get(TAG_KEYS.onTime),
      offTime: tags.get(TAG_KEYS.offTime),
      disabledUntil: tags.get(TAG_KEYS.disabledUntil),
    },
    stakeholders: parseStakeholders(tags.get(TAG_KEYS.stakeholders)),
  };
}

export class EC2Service implements InstanceGateway {
  private clients: Map<string, EC2Client> = new Map();
  private readonly maxRetries: number;
  private readonly retryDelay: number;
  private readonly log: Logger;

  constructor(options: EC2ServiceOptions = {}) {
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelay = options.retryDelayMs ?? 5000;
    this.log = options.log ?? componentLogger('ec2');
  }

  private getClient(region: string): EC2Client {
    let client = this.clients.get(region);
    if (!client) {
      client = new EC2Client({ region });
      this.clients.set(region, client);
    }
    return client;
  }

  async listInstances(region: string): Promise<InstanceSnapshot[]> {
    const client = this.getClient(region);
    const snapshots: InstanceSnapshot[] = [];
    let nextToken: string | undefined;

    try {
      do {
        const response = await client.send(
          new DescribeInstancesCommand({
            Filters: [{ Name: 'instance-state-name', Values: LISTED_STATES }],
            NextToken: nextToken,
          })
        );
        for (const reservation of response.Reservations ?? []) {
          for (const instance of reservation.Instances ?? []) {
            const snapshot = toSnapshot(instance, region);
            if (snapshot) {
              snapshots.push(snapshot);
            }
          }
        }
        nextToken = response.NextToken;
      } while (nextToken);
    } catch (error) {
      throw new InstanceListingError(region, errorMessage(error));
    }

    this.log.debug({ region, instanceCount: snapshots.length }, `[${region}] Listed ${snapshots.length} instances`);
    return snapshots;
  }

  startInstance(instanceId: string, region: string): Promise<PowerActionResult> {
    return this.changePowerState(instanceId, region, 'start');
  }

  stopInstance(instanceId: string, region: string): Promise<PowerActionResult> {
    return this.changePowerState(instanceId, region, 'stop');
  }

  private async changePowerState(
    instanceId: string,
    region: string,
    action: 'start' | 'stop'
  ): Promise<PowerActionResult> {
    const startTime = new Date();
    const client = this.getClient(region);
    const targetState = action === 'start' ? InstanceStateName.running : InstanceStateName.stopped;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        this.log.info(
          { region, instanceId, action, attempt },
          `[${region}] ${action === 'start' ? 'Starting' : 'Stopping'} instance ${instanceId} (Attempt ${attempt}/${this.maxRetries})`
        );

        const describeResponse = await client.send(
          new DescribeInstancesCommand({ InstanceIds: [instanceId] })
        );
        const instance = describeResponse.Reservations?.[0]?.Instances?.[0];

        if (!instance) {
          throw new Error(`Instance ${instanceId} not found in region ${region}`);
        }

        const previousState = instance.State?.Name ?? 'unknown';

        if (previousState === targetState) {
          this.log.info({ region, instanceId, action }, `[${region}] Instance ${instanceId} is already ${targetState}`);
          return {
            instanceId,
            region,
            action,
            success: true,
            changed: false,
            startTime,
            duration: Date.now() - startTime.getTime(),
            previousState,
            currentState: targetState,
          };
        }

        if (previousState === InstanceStateName.terminated) {
          throw new Error(`Cannot ${action} terminated instance`);
        }

        let currentState: string;
        if (action === 'start') {
          const response = await client.send(new StartInstancesCommand({ InstanceIds: [instanceId] }));
          currentState = response.StartingInstances?.[0]?.CurrentState?.Name ?? 'unknown';
        } else {
          const response = await client.send(new StopInstancesCommand({ InstanceIds: [instanceId] }));
          currentState = response.StoppingInstances?.[0]?.CurrentState?.Name ?? 'unknown';
        }

        this.log.info(
          { region, instanceId, action, previousState, currentState },
          `[${region}] Successfully ${action === 'start' ? 'started' : 'stopped'} instance ${instanceId}`
        );

        return {
          instanceId,
          region,
          action,
          success: true,
          changed: true,
          startTime,
          duration: Date.now() - startTime.getTime(),
          previousState,
          currentState,
        };
      } catch (error) {
        const message = errorMessage(error);
        this.log.error(
          { region, instanceId, action, attempt, error: message },
          `[${region}] Error during ${action} of instance ${instanceId} (Attempt ${attempt})`
        );

        if (attempt === this.maxRetries) {
          return { instanceId, region, action, success: false, changed: false, error: message, startTime };
        }

        await this.sleep(this.retryDelay * attempt);
      }
    }

    return { instanceId, region, action, success: false, changed: false, error: 'Max retries reached', startTime };
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
