import { Logger } from '@nestjs/common';
import { discordFetch } from './discord-http.util';

function response(status: number, headers: Record<string, string> = {}) {
  return new Response(null, { status, headers });
}

describe('discordFetch', () => {
  const fetchMock = jest.fn<ReturnType<typeof fetch>, Parameters<typeof fetch>>();
  const sleep = jest.fn<Promise<void>, [number]>();

  beforeEach(() => {
    jest.spyOn(global, 'fetch').mockImplementation(fetchMock);
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
    sleep.mockResolvedValue(undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fetchMock.mockReset();
    sleep.mockReset();
  });

  it('returns non-429 responses immediately', async () => {
    fetchMock.mockResolvedValueOnce(response(200));

    const result = await discordFetch('https://discord.test/x', undefined, { sleep });

    expect(result.status).toBe(200);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('waits for Retry-After seconds before retrying', async () => {
    fetchMock
      .mockResolvedValueOnce(response(429, { 'retry-after': '1.5' }))
      .mockResolvedValueOnce(response(200));

    const result = await discordFetch('https://discord.test/x', undefined, { sleep });

    expect(result.status).toBe(200);
    expect(sleep).toHaveBeenCalledWith(1500);
  });

  it('backs off exponentially without a Retry-After header', async () => {
    fetchMock.mockResolvedValue(response(429));

    const result = await discordFetch('https://discord.test/x', undefined, {
      sleep,
      maxRetries: 2,
    });

    expect(result.status).toBe(429);
    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[1000], [2000]]);
  });
});
