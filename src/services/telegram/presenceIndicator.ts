import { createServiceLogger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';

const logger = createServiceLogger('presenceIndicator');

export interface PresenceIndicator {
  stop(): void;
}

/**
 * Keep a chat action ("uploading video...") visible while a job runs.
 * Telegram clears an action after about five seconds, so it is resent on an
 * interval until stop() is called. Send failures are logged and skipped.
 */
export function startPresenceIndicator(
  send: () => Promise<void>,
  intervalMs: number
): PresenceIndicator {
  let stopped = false;

  const tick = (): void => {
    if (stopped) {
      return;
    }
    send().catch(error => {
      logger.debug('Chat action failed', { error: getErrorMessage(error) });
    });
  };

  tick();
  const handle = setInterval(tick, intervalMs);

  return {
    stop: () => {
      stopped = true;
      clearInterval(handle);
    },
  };
}
