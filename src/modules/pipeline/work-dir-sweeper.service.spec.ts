import { Test } from '@nestjs/testing';
import { existsSync } from 'fs';
import { mkdir, mkdtemp, rm, utimes, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { PIPELINE_CONFIG, PipelineConfig } from '../../common/config/pipeline.config';
import { WorkDirSweeperService } from './work-dir-sweeper.service';

const HOUR_MS = 60 * 60 * 1000;

describe('WorkDirSweeperService', () => {
  let root: string;

  async function createSweeper(tempDir: string): Promise<WorkDirSweeperService> {
    const config: PipelineConfig = {
      tempDir,
      segmentConcurrency: 1,
      taskTimeoutMs: HOUR_MS,
      staleWorkDirMs: 6 * HOUR_MS,
      mail: null,
    };
    const moduleRef = await Test.createTestingModule({
      providers: [WorkDirSweeperService, { provide: PIPELINE_CONFIG, useValue: config }],
    }).compile();
    return moduleRef.get(WorkDirSweeperService);
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'sweeper-spec-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('removes work directories older than the threshold', async () => {
    const now = Date.now();
    const stale = join(root, 'task-a-abc123');
    const fresh = join(root, 'task-b-def456');
    await mkdir(stale);
    await writeFile(join(stale, 'source.mp3'), 'data');
    await mkdir(fresh);
    const staleTime = new Date(now - 7 * HOUR_MS);
    await utimes(stale, staleTime, staleTime);

    const sweeper = await createSweeper(root);

    await expect(sweeper.sweep(now)).resolves.toBe(1);
    expect(existsSync(stale)).toBe(false);
    expect(existsSync(fresh)).toBe(true);
  });

  it('ignores plain files in the root', async () => {
    const file = join(root, 'notes.txt');
    await writeFile(file, 'keep');
    const old = new Date(Date.now() - 10 * HOUR_MS);
    await utimes(file, old, old);

    const sweeper = await createSweeper(root);

    await expect(sweeper.sweep()).resolves.toBe(0);
    expect(existsSync(file)).toBe(true);
  });

  it('does nothing when the root does not exist', async () => {
    const sweeper = await createSweeper(join(root, 'missing'));

    await expect(sweeper.sweep()).resolves.toBe(0);
  });
});
