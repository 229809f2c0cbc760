import { existsSync } from 'fs';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { DownloadError } from '../../common/errors/pipeline.errors';
import { DownloaderService, localFileName } from './downloader.service';

describe('localFileName', () => {
  it('uses the last path component without the query string', () => {
    expect(localFileName('https://files.test/podcasts/episode-12.mp3?sig=abc', 1700000000000)).toBe(
      'episode-12.mp3-1700000000000',
    );
  });

  it('falls back to a generic name for bare hosts', () => {
    expect(localFileName('https://files.test/', 5)).toBe('audio-5');
  });

  it('replaces characters that are unsafe in file names', () => {
    expect(localFileName('https://files.test/my%20talk.wav', 7)).toBe('my_20talk.wav-7');
  });
});

describe('DownloaderService', () => {
  const service = new DownloaderService();
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'downloader-'));
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('streams the response body to the target path', async () => {
    jest.spyOn(global, 'fetch').mockResolvedValue(new Response('fake-audio-bytes'));
    const target = join(dir, 'talk.mp3-1');

    const asset = await service.download('https://files.test/talk.mp3', target);

    expect(asset).toEqual({ path: target, byteSize: 16 });
    expect(await readFile(target, 'utf-8')).toBe('fake-audio-bytes');
  });

  it('fails with DownloadError on a non-2xx status', async () => {
    jest
      .spyOn(global, 'fetch')
      .mockResolvedValue(new Response('gone', { status: 404, statusText: 'Not Found' }));
    const target = join(dir, 'missing.mp3-1');

    const attempt = service.download('https://files.test/missing.mp3', target);

    await expect(attempt).rejects.toBeInstanceOf(DownloadError);
    await expect(attempt).rejects.toThrow(
      'Failed to download https://files.test/missing.mp3: 404 Not Found',
    );
    expect(existsSync(target)).toBe(false);
  });

  it('fails with DownloadError on a network error', async () => {
    jest.spyOn(global, 'fetch').mockRejectedValue(new TypeError('fetch failed'));

    await expect(
      service.download('https://files.test/a.mp3', join(dir, 'a.mp3-1')),
    ).rejects.toThrow('Failed to fetch https://files.test/a.mp3: fetch failed');
  });
});
