import { describe, it, expect } from 'vitest';
import { TelegramService } from '../src/notifications/telegram.service';
import { fakeHttp } from './helpers';

describe('TelegramService', () => {
  it('sends to the configured chat', async () => {
    const { http, requests } = fakeHttp(() => ({ ok: true, result: {} }));
    const telegram = new TelegramService({ token: 'test-token', chatId: '42', timeoutMs: 1000, http });

    expect(await telegram.send('hello')).toBe(true);
    expect(requests).toEqual([{ method: 'post', url: '/sendMessage', params: undefined, body: { chat_id: '42', text: 'hello' } }]);
  });

  it('reports a failed send as false instead of throwing', async () => {
    const { http } = fakeHttp(() => {
      throw new Error('getaddrinfo ENOTFOUND api.telegram.org');
    });
    const telegram = new TelegramService({ token: 'test-token', chatId: '42', timeoutMs: 1000, http });

    await expect(telegram.send('hello')).resolves.toBe(false);
  });

  it('drops messages when no token is set', async () => {
    const { http, requests } = fakeHttp(() => ({ ok: true }));
    const telegram = new TelegramService({ token: '', chatId: '42', timeoutMs: 1000, http });

    expect(telegram.isConfigured()).toBe(false);
    expect(await telegram.send('hello')).toBe(false);
    expect(requests).toEqual([]);
  });

  it('replies to an arbitrary chat', async () => {
    const { http, requests } = fakeHttp(() => ({ ok: true, result: {} }));
    const telegram = new TelegramService({ token: 'test-token', chatId: '42', timeoutMs: 1000, http });

    await telegram.reply(7, 'pong');
    expect(requests[0].body).toEqual({ chat_id: 7, text: 'pong' });
  });

  it('long-polls for message updates', async () => {
    const { http, requests } = fakeHttp(() => ({
      ok: true,
      result: [{ update_id: 9, message: { message_id: 1, chat: { id: 7, type: 'private' }, text: '/status' } }],
    }));
    const telegram = new TelegramService({ token: 'test-token', chatId: '42', timeoutMs: 1000, http });

    const updates = await telegram.getUpdates(9, 25);

    expect(requests[0].url).toBe('/getUpdates');
    expect(requests[0].params).toEqual({ offset: 9, timeout: 25, allowed_updates: '["message"]' });
    expect(updates).toEqual([{ update_id: 9, message: { chat: { id: 7 }, text: '/status' } }]);
  });

  it('rejects a failed poll', async () => {
    const { http } = fakeHttp(() => ({ ok: false, description: 'Unauthorized' }));
    const telegram = new TelegramService({ token: 'test-token', chatId: '42', timeoutMs: 1000, http });

    await expect(telegram.getUpdates(0, 25)).rejects.toThrow(/^Telegram getUpdates failed/);
  });
});
