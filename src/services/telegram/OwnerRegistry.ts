import { createServiceLogger } from '../../middleware/logging.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { OwnerStore } from './types.js';

const logger = createServiceLogger('OwnerRegistry');

/**
 * Single-owner access control for the bot
 *
 * The first user to write to the bot becomes its owner; everyone else is
 * ignored. Claims are serialized through a promise chain so two first
 * messages arriving together cannot both win.
 */
export class OwnerRegistry {
  private ownerId: number | undefined;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly store: OwnerStore,
    initialOwner?: number
  ) {
    this.ownerId = initialOwner;
  }

  currentOwner(): number | undefined {
    return this.ownerId;
  }

  /**
   * Claim ownership for `userId` if nobody owns the bot yet.
   *
   * @returns whether `userId` is the owner afterwards
   */
  tryClaim(userId: number): Promise<boolean> {
    const result = this.queue.then(() => this.claim(userId));
    this.queue = result.catch(() => undefined);
    return result;
  }

  private async claim(userId: number): Promise<boolean> {
    if (this.ownerId !== undefined) {
      return this.ownerId === userId;
    }

    this.ownerId = userId;
    logger.info('Bot owner registered', { ownerId: userId });

    // Ownership holds for this process even when it cannot be persisted
    try {
      await this.store.save(userId);
    } catch (error) {
      logger.error('Failed to persist bot owner', { ownerId: userId, error: getErrorMessage(error) });
    }
    return true;
  }
}
