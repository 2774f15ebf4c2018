import type { ScheduledEvent } from 'aws-lambda';
import { createScheduler, resolveConfig } from '../app';
import type { CycleOutcome } from '../types';
import { errorMessage } from '../types/errors';
import { componentLogger } from '../utils/logger';

const log = componentLogger('handler');

export const handler = async (event: ScheduledEvent): Promise<CycleOutcome> => {
  log.info({ eventId: event.id, eventTime: event.time }, `Power scheduler triggered at: ${new Date().toISOString()}`);

  try {
    const config = await resolveConfig();
    const { outcome } = await createScheduler(config).runCycle();
    return outcome;
  } catch (error) {
    log.fatal({ error: errorMessage(error) }, 'Power scheduler cycle failed');
    throw error;
  }
};
