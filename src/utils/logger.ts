import pino from 'pino';
import type { DestinationStream, Logger } from 'pino';

export type { Logger } from 'pino';

const isTestRun = process.env.VITEST === 'true' || process.env.NODE_ENV === 'test';

const isoTimestamp = (): string => `,"timestamp":"${new Date().toISOString()}"`;

/**
 * JSON logger on stdout. Every line carries `timestamp`, an upper-case `level`,
 * the service name and the pod identity; modules add their own `component`
 * binding via child().
 *
 * Output is silenced under the test runner unless an explicit destination is given.
 */
export function makeLogger(bindings?: Record<string, unknown>, destination?: DestinationStream): Logger {
  const options = {
    level: process.env.LOG_LEVEL ?? 'info',
    enabled: destination !== undefined || !isTestRun,
    base: {
      service: process.env.SERVICE_NAME ?? 'ec2-power-scheduler',
      podName: process.env.HOSTNAME || 'unknown',
      namespace: process.env.POD_NAMESPACE || 'unknown',
      deployment: process.env.DEPLOYMENT_NAME || 'unknown',
      ...bindings,
    },
    messageKey: 'message',
    timestamp: isoTimestamp,
    formatters: {
      level: (label: string) => ({ level: label.toUpperCase() }),
    },
  };
  return destination ? pino(options, destination) : pino(options);
}

export const logger = makeLogger();

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
