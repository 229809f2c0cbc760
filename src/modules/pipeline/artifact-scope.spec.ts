import { Logger } from '@nestjs/common';
import { existsSync } from 'fs';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ArtifactScope, withArtifactScope } from './artifact-scope';

describe('ArtifactScope', () => {
  const logger = new Logger('ArtifactScopeSpec');
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'artifact-scope-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('removes tracked files when the work succeeds', async () => {
    const file = join(root, 'a.wav');

    const value = await withArtifactScope(logger, 'ok', async (scope) => {
      await writeFile(scope.track(file), 'data');
      expect(existsSync(file)).toBe(true);
      return 42;
    });

    expect(value).toBe(42);
    expect(existsSync(file)).toBe(false);
  });

  it('removes tracked files when the work throws', async () => {
    const file = join(root, 'b.wav');

    await expect(
      withArtifactScope(logger, 'fail', async (scope) => {
        await writeFile(scope.track(file), 'data');
        throw new Error('stage failed');
      }),
    ).rejects.toThrow('stage failed');

    expect(existsSync(file)).toBe(false);
  });

  it('tolerates artifacts that were never written', async () => {
    await withArtifactScope(logger, 'missing', async (scope) => {
      scope.track(join(root, 'never-created.flac'));
    });
  });

  it('removes tracked directories recursively', async () => {
    const dir = join(root, 'task-1');
    await mkdir(dir);
    await writeFile(join(dir, 'untracked.tmp'), 'x');

    await withArtifactScope(logger, 'dir', async (scope) => {
      scope.trackDirectory(dir);
    });

    expect(existsSync(dir)).toBe(false);
  });

  it('forgets its artifacts once released', async () => {
    const scope = new ArtifactScope(logger, 'order');
    scope.track(join(root, 'first'));
    scope.track(join(root, 'second'));

    expect(scope.paths).toEqual([join(root, 'first'), join(root, 'second')]);
    await scope.release();
    expect(scope.paths).toEqual([]);
  });

  it('rejects registration after release', async () => {
    const scope = new ArtifactScope(logger, 'closed');
    await scope.release();

    expect(() => scope.track(join(root, 'late'))).toThrow('Artifact scope "closed" already released');
  });
});
