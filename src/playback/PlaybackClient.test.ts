import { afterEach, describe, expect, it, vi } from 'vitest';
import { PlaybackClient, PlaybackError } from './PlaybackClient.js';

function stubFetch(respond: () => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => respond());
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

describe('PlaybackClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('builds the base URL from a bare host or host:port', () => {
    expect(PlaybackClient.forHost('192.168.1.50').baseUrl).toBe('http://192.168.1.50:8082');
    expect(PlaybackClient.forHost('192.168.1.50:9000').baseUrl).toBe('http://192.168.1.50:9000');
    expect(new PlaybackClient('http://player.local/').baseUrl).toBe('http://player.local');
  });

  it('posts the clip URL and format to /play', async () => {
    const fetchMock = stubFetch(() => new Response('{"status":"playing"}', { status: 200 }));
    const client = new PlaybackClient('http://player.local');

    const reply = await client.play('http://10.0.0.5:8080/audio/tts_1.mp3', 'mp3');

    expect(reply).toEqual({ status: 'playing' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe('http://player.local/play');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"url":"http://10.0.0.5:8080/audio/tts_1.mp3","format":"mp3"}');
  });

  it('sends stop without a body and tolerates an empty reply', async () => {
    const fetchMock = stubFetch(() => new Response('', { status: 200 }));

    expect(await new PlaybackClient('http://player.local').stop()).toEqual({});
    expect(fetchMock.mock.calls[0][1]?.body).toBeUndefined();
  });

  it('posts the volume level', async () => {
    const fetchMock = stubFetch(() => new Response('{"volume":7}', { status: 200 }));

    expect(await new PlaybackClient('http://player.local').volume(7)).toEqual({ volume: 7 });
    expect(fetchMock.mock.calls[0][1]?.body).toBe('{"level":7}');
  });

  it('raises PLAYBACK_FAILED on a non-2xx answer', async () => {
    stubFetch(() => new Response('busy', { status: 503 }));

    const err = await new PlaybackClient('http://player.local').play('http://x/a.wav', 'wav').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(PlaybackError);
    expect(err).toMatchObject({ code: 'PLAYBACK_FAILED', message: 'Player answered 503 on /play: busy' });
  });

  it('raises PLAYBACK_FAILED when the player is unreachable', async () => {
    stubFetch(() => Promise.reject(new TypeError('fetch failed')));

    await expect(new PlaybackClient('http://player.local').stop()).rejects.toMatchObject({ code: 'PLAYBACK_FAILED' });
  });
});
