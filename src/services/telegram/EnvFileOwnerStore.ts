import fs from 'fs-extra';
import { createServiceLogger } from '../../middleware/logging.js';
import { TELEGRAM } from '../../config/constants.js';
import { isNotFoundError } from '../../utils/errorHandling.js';
import { OwnerStore } from './types.js';

const logger = createServiceLogger('EnvFileOwnerStore');

/**
 * Set `key=value` in env-file text, replacing the first assignment of `key`
 * or appending one. A trailing newline is preserved.
 */
export function upsertEnvLine(content: string, key: string, value: string): string {
  const entry = `${key}=${value}`;
  if (content === '') {
    return `${entry}\n`;
  }

  const lines = content.split('\n');
  const index = lines.findIndex(line => line.startsWith(`${key}=`));
  if (index >= 0) {
    lines[index] = entry;
  } else if (lines[lines.length - 1] === '') {
    lines.splice(lines.length - 1, 0, entry);
  } else {
    lines.push(entry);
  }
  return lines.join('\n');
}

/**
 * Persists the owner id as TELEGRAM_OWNER in the env file dotenv reads at
 * startup, so the claim survives restarts.
 */
export class EnvFileOwnerStore implements OwnerStore {
  constructor(private readonly envFile: string) {}

  async save(ownerId: number): Promise<void> {
    let content = '';
    try {
      content = await fs.readFile(this.envFile, 'utf8');
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }
      logger.info('Env file missing, creating it', { envFile: this.envFile });
    }

    await fs.outputFile(this.envFile, upsertEnvLine(content, TELEGRAM.OWNER_ENV_KEY, String(ownerId)));
    logger.info('Saved bot owner to env file', { envFile: this.envFile, ownerId });
  }
}
