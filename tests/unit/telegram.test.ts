import { describe, expect, it, vi } from 'vitest';
import { createTelegramNotifier, formatDraftNotice } from '../../src/monitoring/telegram.js';

function fakeFetch(status = 200) {
  return vi.fn(async (_url: string | URL | Request, _init?: RequestInit) => new Response(null, { status }));
}

describe('createTelegramNotifier', () => {
  it('sends nothing without a token and chat id', async () => {
    const fetchFn = fakeFetch();
    await createTelegramNotifier({ botToken: 'test-token', fetchFn }).info('hello');
    await createTelegramNotifier({ chatId: '42', fetchFn }).error('hello');
    expect(fetchFn).not.toHaveBeenCalled();
  });

  it('posts an HTML message to the bot API', async () => {
    const fetchFn = fakeFetch();
    await createTelegramNotifier({ botToken: 'test-token', chatId: '42', fetchFn }).info('hello');

    expect(fetchFn).toHaveBeenCalledTimes(1);
    const firstCall = fetchFn.mock.calls[0];
    const init = firstCall?.[1];
    expect(firstCall?.[0]).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({ chat_id: '42', text: 'ℹ️ hello', parse_mode: 'HTML' });
  });

  it('resolves when the request fails', async () => {
    const failing = vi.fn(async (_url: string | URL | Request, _init?: RequestInit): Promise<Response> => {
      throw new Error('offline');
    });
    const notifier = createTelegramNotifier({ botToken: 'test-token', chatId: '42', fetchFn: failing });
    await expect(notifier.error('boom')).resolves.toBeUndefined();
    await expect(
      createTelegramNotifier({ botToken: 'test-token', chatId: '42', fetchFn: fakeFetch(500) }).info('x'),
    ).resolves.toBeUndefined();
  });
});

describe('formatDraftNotice', () => {
  it('summarizes a finished draft', () => {
    expect(
      formatDraftNotice({
        round: 2,
        totalDrafts: 5,
        engagementScore: 7,
        plotHolesFound: true,
        sceneCount: 6,
        durationSeconds: 93.4,
      }),
    ).toBe('🎬 <b>Draft 2 of 5 complete</b>\nScore: 7/10 🚨 plot holes\nScenes: 6\nTime: 93.4s');
  });

  it('marks a missing score', () => {
    expect(
      formatDraftNotice({
        round: 1,
        totalDrafts: 1,
        engagementScore: null,
        plotHolesFound: null,
        sceneCount: 0,
        durationSeconds: 2,
      }),
    ).toBe('🎬 <b>Draft 1 of 1 complete</b>\nScore: n/a/10\nScenes: 0\nTime: 2.0s');
  });
});
