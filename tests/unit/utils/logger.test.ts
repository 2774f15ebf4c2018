import { describe, it, expect, vi, afterEach } from 'vitest';
import { makeLogger } from '../../../src/utils/logger';

function capture() {
  const lines: string[] = [];
  return {
    lines,
    stream: {
      write(message: string) {
        lines.push(message);
      },
    },
  };
}

describe('makeLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('writes timestamp, level, component and message fields', () => {
    const { lines, stream } = capture();

    makeLogger(undefined, stream).child({ component: 'scheduler_completion' }).info({ instancesStarted: 2 }, 'done');

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]);
    expect(entry).toMatchObject({
      level: 'INFO',
      service: 'ec2-power-scheduler',
      component: 'scheduler_completion',
      instancesStarted: 2,
      message: 'done',
    });
    expect(entry.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    expect(entry).not.toHaveProperty('time');
    expect(entry).not.toHaveProperty('msg');
  });

  it('tags every line with the pod identity', () => {
    vi.stubEnv('HOSTNAME', 'power-scheduler-28934-abcde');
    vi.stubEnv('POD_NAMESPACE', 'ec2-power-scheduler');
    vi.stubEnv('DEPLOYMENT_NAME', 'power-scheduler');
    const { lines, stream } = capture();

    makeLogger(undefined, stream).warn('fallback timezone');

    expect(JSON.parse(lines[0])).toMatchObject({
      level: 'WARN',
      podName: 'power-scheduler-28934-abcde',
      namespace: 'ec2-power-scheduler',
      deployment: 'power-scheduler',
    });
  });

  it('marks pod fields unknown outside a cluster', () => {
    vi.stubEnv('POD_NAMESPACE', '');
    const { lines, stream } = capture();

    makeLogger(undefined, stream).error('listing failed');

    expect(JSON.parse(lines[0]).namespace).toBe('unknown');
  });
});
