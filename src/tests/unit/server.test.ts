import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Server } from 'node:http';
import { createApp, startServer, stopServer } from '../../server.js';
import { telegramMessageUpdate } from '../helpers/telegram.js';

describe('server', () => {
  const handleWebhook = vi.fn<(body: unknown) => boolean>();
  let server: Server;
  let baseUrl: string;
  let state: string;

  beforeEach(async () => {
    handleWebhook.mockReset();
    state = 'Running';
    server = await startServer(createApp({ handleWebhook }, () => state), 0, '127.0.0.1');
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await stopServer(server);
  });

  it('should report health with the dispatcher state', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({ status: 'ok', state: 'Running' });
  });

  it('should hand webhook updates to the adapter', async () => {
    handleWebhook.mockReturnValue(true);
    const update = telegramMessageUpdate(3, 100, 'hello');

    const response = await fetch(`${baseUrl}/webhook/telegram`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(update),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ ok: true });
    expect(handleWebhook).toHaveBeenCalledWith(update);
  });

  it.each(['Starting', 'Draining', 'Stopped'])('should ask Telegram to retry while %s', async (current) => {
    state = current;

    const response = await fetch(`${baseUrl}/webhook/telegram`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(telegramMessageUpdate(9, 7, 'hello')),
    });

    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({ ok: false, error: 'Not accepting updates' });
    expect(handleWebhook).not.toHaveBeenCalled();
  });

  it('should reject bodies the adapter refuses', async () => {
    handleWebhook.mockReturnValue(false);

    const response = await fetch(`${baseUrl}/webhook/telegram`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify({ hello: 'world' }),
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ ok: false, error: 'Invalid update' });
  });

  it('should answer malformed JSON with 400', async () => {
    const response = await fetch(`${baseUrl}/webhook/telegram`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{not json',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Bad request' });
    expect(handleWebhook).not.toHaveBeenCalled();
  });
});
