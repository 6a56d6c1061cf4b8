import logger from '../../common/utils/logger';
import { TelegramUpdate } from '../../notifications/telegram.service';

export interface UpdateSource {
  getUpdates(offset: number, timeoutSeconds: number): Promise<TelegramUpdate[]>;
  reply(chatId: string | number, text: string): Promise<boolean>;
}

export type CommandHandler = () => string;

interface ListenerOptions {
  pollTimeoutSeconds?: number;
  backoffMs?: number;
}

/**
 * "/status", "/status@SomeBot" and "/status extra" all give "status".
 */
export const parseCommand = (text: string): string | null => {
  const match = /^\/([a-z_]+)(?:@\S+)?(?:\s|$)/i.exec(text.trim());
  return match ? match[1].toLowerCase() : null;
};

export class CommandListener {
  private offset = 0;
  private active = false;
  private loop: Promise<void> | null = null;
  private readonly pollTimeoutSeconds: number;
  private readonly backoffMs: number;

  constructor(
    private readonly source: UpdateSource,
    private readonly handlers: Record<string, CommandHandler>,
    options: ListenerOptions = {}
  ) {
    this.pollTimeoutSeconds = options.pollTimeoutSeconds ?? 25;
    this.backoffMs = options.backoffMs ?? 5000;
  }

  /**
   * Fetches one batch of updates and answers the known commands in it.
   * Returns how many commands were answered.
   */
  async pollOnce(): Promise<number> {
    const updates = await this.source.getUpdates(this.offset, this.pollTimeoutSeconds);
    let answered = 0;

    for (const update of updates) {
      this.offset = Math.max(this.offset, update.update_id + 1);

      const text = update.message?.text;
      if (!update.message || !text) continue;

      const command = parseCommand(text);
      const handler = command ? this.handlers[command] : undefined;
      if (!command || !handler) continue;

      logger.info({ command, chatId: update.message.chat.id }, 'Command received');
      await this.source.reply(update.message.chat.id, handler());
      answered += 1;
    }

    return answered;
  }

  private async run() {
    while (this.active) {
      try {
        await this.pollOnce();
      } catch (error) {
        logger.warn({ err: error }, 'Command poll failed, backing off');
        await new Promise((resolve) => setTimeout(resolve, this.backoffMs));
      }
    }
  }

  start() {
    if (this.active) return;
    this.active = true;
    this.loop = this.run();
    logger.info({ commands: Object.keys(this.handlers) }, 'Command listener started');
  }

  // Resolves once the in-flight poll has finished
  async stop() {
    this.active = false;
    await this.loop;
    this.loop = null;
  }
}
