import { ActuationError, errorMessage } from '../types/errors';
import type {
  ActionDecision,
  CycleOutcome,
  InstanceGateway,
  InstanceSnapshot,
  Notifier,
  PowerActionResult,
} from '../types';
import { logger, type Logger } from '../utils/logger';
import { Reconciler, type ReconcileResult } from './reconciler';
import { notifyStakeholders } from './slackService';

export interface PowerSchedulerOptions {
  gateway: InstanceGateway;
  reconciler: Reconciler;
  regions: string[];
  notifier?: Notifier;
  log?: Logger;
}

export interface CycleReport {
  outcome: CycleOutcome;
  results: ReconcileResult[];
  actuations: PowerActionResult[];
}

/**
 * Runs one evaluation cycle: list, reconcile, actuate, notify.
 *
 * Per-instance problems become counted outcomes. Only a failure to list
 * instances rejects the returned promise.
 */
export class PowerScheduler {
  private readonly gateway: InstanceGateway;
  private readonly reconciler: Reconciler;
  private readonly regions: string[];
  private readonly notifier?: Notifier;
  private readonly startLog: Logger;
  private readonly actionLog: Logger;
  private readonly completionLog: Logger;

  constructor(options: PowerSchedulerOptions) {
    this.gateway = options.gateway;
    this.reconciler = options.reconciler;
    this.regions = options.regions;
    this.notifier = options.notifier;
    const log = options.log ?? logger;
    this.startLog = log.child({ component: 'scheduler_start' });
    this.actionLog = log.child({ component: 'instance_action' });
    this.completionLog = log.child({ component: 'scheduler_completion' });
  }

  async runCycle(nowUtc: Date = new Date()): Promise<CycleReport> {
    this.startLog.info(
      {
        regions: this.regions,
        currentTime: nowUtc.toISOString(),
        notificationsEnabled: this.notifier !== undefined,
      },
      'Starting EC2 scheduler'
    );

    const instances = await this.collectInstances();
    const outcome: CycleOutcome = { processed: 0, started: 0, stopped: 0, skipped: 0, errors: 0 };
    const results: ReconcileResult[] = [];
    const actuations: PowerActionResult[] = [];

    for (const instance of instances) {
      const result = this.reconciler.reconcile(instance, nowUtc);
      results.push(result);

      if (result.kind === 'skipped') {
        outcome.skipped++;
        continue;
      }
      if (result.kind === 'failed') {
        outcome.errors++;
        continue;
      }

      outcome.processed++;
      const actuation = await this.apply(result.decision, nowUtc);
      if (!actuation) {
        continue;
      }
      actuations.push(actuation);

      if (!actuation.success) {
        outcome.errors++;
        continue;
      }
      if (!actuation.changed) {
        continue;
      }
      if (actuation.action === 'start') {
        outcome.started++;
      } else {
        outcome.stopped++;
      }
    }

    this.completionLog.info(
      {
        instancesProcessed: outcome.processed,
        instancesStarted: outcome.started,
        instancesStopped: outcome.stopped,
        instancesSkipped: outcome.skipped,
        errors: outcome.errors,
      },
      `Scheduler completed: ${outcome.processed} processed, ${outcome.started} started, ${outcome.stopped} stopped`
    );

    return { outcome, results, actuations };
  }

  private async collectInstances(): Promise<InstanceSnapshot[]> {
    const seen = new Set<string>();
    const instances: InstanceSnapshot[] = [];
    for (const region of this.regions) {
      for (const instance of await this.gateway.listInstances(region)) {
        if (!seen.has(instance.id)) {
          seen.add(instance.id);
          instances.push(instance);
        }
      }
    }
    return instances;
  }

  private async apply(decision: ActionDecision, nowUtc: Date): Promise<PowerActionResult | undefined> {
    const { instance, action } = decision;
    const fields = {
      instanceName: instance.name,
      instanceId: instance.id,
      currentState: instance.currentState,
      desiredState: decision.desiredState,
      action,
    };

    if (action === 'none') {
      this.actionLog.info(
        { ...fields, reason: 'instance is already in correct state or transitioning' },
        `No action needed for instance ${instance.name} (${instance.currentState})`
      );
      return undefined;
    }

    this.actionLog.info(fields, `${action === 'start' ? 'Starting' : 'Stopping'} instance ${instance.name}`);

    let result: PowerActionResult;
    try {
      result =
        action === 'start'
          ? await this.gateway.startInstance(instance.id, instance.region)
          : await this.gateway.stopInstance(instance.id, instance.region);
    } catch (error) {
      result = {
        instanceId: instance.id,
        region: instance.region,
        action,
        success: false,
        changed: false,
        error: errorMessage(error),
        startTime: nowUtc,
      };
    }

    if (!result.success) {
      const failure = new ActuationError(instance.id, action, result.error ?? 'unknown error');
      this.actionLog.error({ ...fields, code: failure.code, error: result.error }, failure.message);
      return result;
    }

    if (!result.changed) {
      this.actionLog.info(
        { ...fields, observedState: result.currentState, reason: 'instance already reached the target state' },
        `No ${action} call needed for instance ${instance.name} - already ${result.currentState}`
      );
      return result;
    }

    if (this.notifier) {
      await notifyStakeholders(this.notifier, instance.stakeholders, {
        instanceName: instance.name,
        instanceId: instance.id,
        action,
        region: instance.region,
        time: nowUtc,
      });
    }

    return result;
  }
}
