import { ConfigService } from '@nestjs/config';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ArchiveError } from '../../common/errors/pipeline.errors';
import { R2Service } from './r2.service';

const mockSend = jest.fn();

jest.mock('@aws-sdk/client-s3', () => ({
  S3Client: jest.fn(() => ({ send: mockSend })),
  PutObjectCommand: jest.fn((input: unknown) => ({ input })),
}));

const fullConfig = {
  bucket: 'audio',
  endpoint: 'https://r2.test',
  accessKey: 'test-access',
  secretKey: 'test-secret',
  publicUrl: 'https://cdn.example.com/',
};

describe('R2Service', () => {
  let root: string;

  const createService = (r2: Record<string, string>) => {
    const service = new R2Service(new ConfigService({ r2 }));
    service.onModuleInit();
    return service;
  };

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'r2-spec-'));
    mockSend.mockReset();
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('stays unavailable without credentials', async () => {
    const service = createService({ bucket: 'audio' });

    expect(service.isAvailable()).toBe(false);
    await expect(service.uploadLocalFile('/tmp/none.mp3', 'audio/t1/none.mp3')).rejects.toBeInstanceOf(
      ArchiveError,
    );
  });

  it('stays unavailable without a public url', async () => {
    const { publicUrl: _publicUrl, ...withoutPublicUrl } = fullConfig;
    const service = createService(withoutPublicUrl);

    expect(service.isAvailable()).toBe(false);
    await expect(service.uploadLocalFile('/tmp/none.mp3', 'audio/t1/none.mp3')).rejects.toThrow(
      'R2 client not configured',
    );
    expect(mockSend).not.toHaveBeenCalled();
  });

  it('uploads the file and returns its public url', async () => {
    const file = join(root, 'a.mp3-1');
    await writeFile(file, 'audio');
    mockSend.mockResolvedValue({});
    const service = createService(fullConfig);

    expect(service.isAvailable()).toBe(true);
    await expect(service.uploadLocalFile(file, 'audio/t1/a.mp3-1')).resolves.toBe(
      'https://cdn.example.com/audio/t1/a.mp3-1',
    );

    const { input } = mockSend.mock.calls[0][0];
    expect(input).toEqual(
      expect.objectContaining({
        Bucket: 'audio',
        Key: 'audio/t1/a.mp3-1',
        ContentLength: 5,
        ContentType: 'audio/mpeg',
      }),
    );
    input.Body.destroy();
  });

  it('closes the file stream when the upload fails', async () => {
    const file = join(root, 'a.mp3-1');
    await writeFile(file, 'audio');
    mockSend.mockRejectedValue(new Error('access denied'));
    const service = createService(fullConfig);

    await expect(service.uploadLocalFile(file, 'audio/t1/a.mp3-1')).rejects.toThrow(
      `Failed to upload ${file} to audio/audio/t1/a.mp3-1: access denied`,
    );

    const { input } = mockSend.mock.calls[0][0];
    expect(input.Body.destroyed).toBe(true);
  });

  it.each([
    ['audio/t1/talk.mp3-1700000000000', 'audio/mpeg'],
    ['audio/t1/episode.M4A-1', 'audio/mp4'],
    ['audio/t1/raw.flac', 'audio/flac'],
    ['audio/t1/stream-1700000000000', 'application/octet-stream'],
  ])('infers the content type of %s', (key, expected) => {
    expect(createService({}).getContentType(key)).toBe(expected);
  });
});
