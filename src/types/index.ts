export interface TimeOfDay {
  readonly hour: number;
  readonly minute: number;
}

export type DesiredState = 'running' | 'stopped';

export type ObservedState = 'running' | 'stopped' | 'pending' | 'stopping' | 'other';

export type PowerAction = 'start' | 'stop' | 'none';

export interface ScheduleTagPair {
  readonly onTime: TimeOfDay;
  readonly offTime: TimeOfDay;
}

/** Raw tag values as they appear on the instance, before parsing. */
export interface RawScheduleTags {
  readonly onTime?: string;
  readonly offTime?: string;
  readonly disabledUntil?: string;
}

export interface InstanceSnapshot {
  readonly id: string;
  readonly name: string;
  readonly region: string;
  readonly currentState: ObservedState;
  readonly schedule: RawScheduleTags;
  readonly stakeholders: readonly string[];
}

export interface ActionDecision {
  readonly instance: InstanceSnapshot;
  readonly desiredState: DesiredState;
  readonly action: PowerAction;
}

export interface PowerActionResult {
  instanceId: string;
  region: string;
  action: Exclude<PowerAction, 'none'>;
  success: boolean;
  /** False when no EC2 call was made because the instance was already in the target state. */
  changed: boolean;
  error?: string;
  startTime: Date;
  duration?: number;
  previousState?: string;
  currentState?: string;
}

export interface CycleOutcome {
  processed: number;
  started: number;
  stopped: number;
  skipped: number;
  errors: number;
}

export interface PowerStateNotice {
  instanceName: string;
  instanceId: string;
  action: Exclude<PowerAction, 'none'>;
  region: string;
  time: Date;
}

/** Lists instances and performs start/stop calls. */
export interface InstanceGateway {
  listInstances(region: string): Promise<InstanceSnapshot[]>;
  startInstance(instanceId: string, region: string): Promise<PowerActionResult>;
  stopInstance(instanceId: string, region: string): Promise<PowerActionResult>;
}

export interface Notifier {
  notify(recipient: string, notice: PowerStateNotice): Promise<void>;
}

export interface SchedulerSettings {
  regions?: string[];
  fallbackTimezone?: string;
  actOnFallbackTimezone?: boolean;
  regionTimezones?: Record<string, string>;
}
