import { setTimeout as sleep } from 'node:timers/promises';

import { logger } from '../logger.js';
import type { TelegramClient } from '../notifications/telegram.js';
import type { CommandHandler } from './commands.js';

export interface PollerOptions {
  /** Long-poll timeout passed to getUpdates */
  timeoutSeconds?: number;
  /** Pause after a failed poll */
  backoffMs?: number;
}

/**
 * Long-polling loop feeding Telegram updates to the command handler
 */
export class UpdatePoller {
  private offset = 0;
  private running = false;
  private loop: Promise<void> | null = null;
  private readonly timeoutSeconds: number;
  private readonly backoffMs: number;

  constructor(
    private readonly client: Pick<TelegramClient, 'getUpdates'>,
    private readonly handler: Pick<CommandHandler, 'handle'>,
    options: PollerOptions = {}
  ) {
    this.timeoutSeconds = options.timeoutSeconds ?? 30;
    this.backoffMs = options.backoffMs ?? 5000;
  }

  get nextOffset(): number {
    return this.offset;
  }

  /**
   * Fetch and handle one batch of updates. Returns how many were processed.
   */
  async pollOnce(): Promise<number> {
    const updates = await this.client.getUpdates(this.offset, this.timeoutSeconds);

    for (const update of updates) {
      // Advance first so a failing update is never redelivered
      this.offset = Math.max(this.offset, update.updateId + 1);
      if (!update.message) continue;

      try {
        await this.handler.handle(update.message);
      } catch (error) {
        logger.error({ err: error, updateId: update.updateId }, 'failed to handle telegram update');
      }
    }

    return updates.length;
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    logger.info({ timeoutSeconds: this.timeoutSeconds }, 'starting telegram bot polling');

    this.loop = this.run();
  }

  /**
   * Stop after the in-flight poll; resolves once the loop has exited
   */
  async stop(): Promise<void> {
    this.running = false;
    await this.loop;
    this.loop = null;
    logger.info('telegram bot polling stopped');
  }

  private async run(): Promise<void> {
    while (this.running) {
      try {
        await this.pollOnce();
      } catch (error) {
        logger.error({ err: error, backoffMs: this.backoffMs }, 'telegram polling failed, backing off');
        if (this.running) {
          await sleep(this.backoffMs);
        }
      }
    }
  }
}
