import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import logger from '../common/utils/logger';

const TELEGRAM_API_URL = 'https://api.telegram.org';

const updatesSchema = z.object({
  ok: z.literal(true),
  result: z.array(
    z.object({
      update_id: z.number(),
      message: z
        .object({
          chat: z.object({ id: z.number() }),
          text: z.string().optional(),
        })
        .optional(),
    })
  ),
});

export type TelegramUpdate = z.infer<typeof updatesSchema>['result'][number];

/**
 * Outbound side of the bot: one fixed destination, boolean result, no retry.
 */
export interface MessagingTransport {
  send(text: string): Promise<boolean>;
}

interface TelegramOptions {
  token: string;
  chatId: string;
  timeoutMs: number;
  http?: AxiosInstance;
}

// Never log the raw axios error: its config carries the bot token in the URL
const describeError = (error: unknown) => {
  if (axios.isAxiosError(error)) {
    return { status: error.response?.status, code: error.code, message: error.message };
  }
  return { message: error instanceof Error ? error.message : String(error) };
};

export class TelegramService implements MessagingTransport {
  private token: string;
  private chatId: string;
  private http: AxiosInstance;

  constructor(options: TelegramOptions) {
    this.token = options.token;
    this.chatId = options.chatId;
    this.http =
      options.http ?? axios.create({ baseURL: `${TELEGRAM_API_URL}/bot${options.token}`, timeout: options.timeoutMs });
  }

  isConfigured(): boolean {
    return this.token.length > 0;
  }

  async send(text: string): Promise<boolean> {
    return this.reply(this.chatId, text);
  }

  async reply(chatId: string | number, text: string): Promise<boolean> {
    if (!this.isConfigured() || chatId === '') {
      logger.warn('Telegram is not configured, message dropped');
      return false;
    }

    try {
      await this.http.post('/sendMessage', { chat_id: chatId, text });
      logger.debug({ chatId }, 'Telegram message sent');
      return true;
    } catch (error) {
      logger.error({ error: describeError(error), chatId }, 'Telegram send error');
      return false;
    }
  }

  /**
   * Long-polls for updates after `offset`. Rejects on transport errors so the
   * listener can back off.
   */
  async getUpdates(offset: number, timeoutSeconds: number): Promise<TelegramUpdate[]> {
    try {
      const res = await this.http.get('/getUpdates', {
        params: { offset, timeout: timeoutSeconds, allowed_updates: JSON.stringify(['message']) },
        timeout: (timeoutSeconds + 10) * 1000,
      });
      return updatesSchema.parse(res.data).result;
    } catch (error) {
      throw new Error(`Telegram getUpdates failed: ${describeError(error).message}`);
    }
  }
}
