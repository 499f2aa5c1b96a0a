import { telegram } from './telegram.js';

vi.mock('../config.js', () => ({
  env: {
    TELEGRAM_BOT_TOKEN: 'test-token',
    TELEGRAM_CHAT_ID: 'test-chat',
    LOG_LEVEL: 'error',
    LOG_FORMAT: 'text',
  },
}));

const fetchMock = vi.fn<Parameters<typeof fetch>, ReturnType<typeof fetch>>();

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('telegram', () => {
  it('posts the plan summary to sendMessage', async () => {
    fetchMock.mockResolvedValue(new Response('{}', { status: 200 }));
    await telegram.planSummary({ requested: 10, produced: 8, discarded: 2, catalogSize: 40 });

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(JSON.parse(String(init?.body))).toMatchObject({
      chat_id: 'test-chat',
      parse_mode: 'HTML',
      text: expect.stringContaining('Produced: 8/10\nDiscarded attempts: 2\nSource videos: 40\n'),
    });
  });

  it('swallows network failures', async () => {
    fetchMock.mockRejectedValue(new Error('offline'));
    await expect(telegram.error('boom')).resolves.toBeUndefined();
  });

  it('does not throw on a non-2xx reply', async () => {
    fetchMock.mockResolvedValue(new Response('nope', { status: 403 }));
    await expect(telegram.info('hello')).resolves.toBeUndefined();
  });
});
