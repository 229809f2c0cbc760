import { Logger } from '@nestjs/common';
import { rm } from 'fs/promises';

interface Artifact {
  path: string;
  directory: boolean;
}

/**
 * 临时文件作用域
 * 产物在创建时登记，release() 按登记的逆序删除
 */
export class ArtifactScope {
  private readonly artifacts: Artifact[] = [];
  private released = false;

  constructor(
    private readonly logger: Logger,
    readonly label: string,
  ) {}

  /**
   * 登记文件，返回原路径
   */
  track(path: string): string {
    this.assertOpen();
    this.artifacts.push({ path, directory: false });
    return path;
  }

  /**
   * 登记目录，释放时连同内容一起删除
   */
  trackDirectory(path: string): string {
    this.assertOpen();
    this.artifacts.push({ path, directory: true });
    return path;
  }

  get paths(): readonly string[] {
    return this.artifacts.map((a) => a.path);
  }

  async release(): Promise<void> {
    if (this.released) return;
    this.released = true;

    for (const artifact of [...this.artifacts].reverse()) {
      try {
        await rm(artifact.path, { force: true, recursive: artifact.directory });
      } catch (err) {
        this.logger.warn(`Failed to cleanup ${artifact.path} (${this.label}): ${err}`);
      }
    }
    this.artifacts.length = 0;
  }

  private assertOpen(): void {
    if (this.released) {
      throw new Error(`Artifact scope "${this.label}" already released`);
    }
  }
}

/**
 * 在作用域内执行 work，无论成功或失败都会释放登记的产物
 */
export async function withArtifactScope<T>(
  logger: Logger,
  label: string,
  work: (scope: ArtifactScope) => Promise<T>,
): Promise<T> {
  const scope = new ArtifactScope(logger, label);
  try {
    return await work(scope);
  } finally {
    await scope.release();
  }
}
