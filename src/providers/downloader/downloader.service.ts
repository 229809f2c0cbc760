import { Injectable, Logger } from '@nestjs/common';
import { createWriteStream } from 'fs';
import { stat } from 'fs/promises';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { DownloadError, errorMessage } from '../../common/errors/pipeline.errors';
import { AudioAsset } from '../../common/interfaces/transcription.interface';

/**
 * 由 URL 生成本地文件名：取最后一段路径，去掉查询参数，追加时间戳保证唯一
 */
export function localFileName(url: string, now: number = Date.now()): string {
  const tokens = url.split('/');
  const last = tokens[tokens.length - 1].split('?')[0].split('#')[0];
  const base = last.replace(/[^A-Za-z0-9._-]/g, '_') || 'audio';
  return `${base}-${now}`;
}

@Injectable()
export class DownloaderService {
  private readonly logger = new Logger(DownloaderService.name);

  /**
   * 下载 url 到 targetPath
   */
  async download(url: string, targetPath: string, signal?: AbortSignal): Promise<AudioAsset> {
    let response: Response;
    try {
      response = await fetch(url, { signal });
    } catch (err) {
      throw new DownloadError(`Failed to fetch ${url}: ${errorMessage(err)}`, { cause: err });
    }

    if (!response.ok || !response.body) {
      throw new DownloadError(`Failed to download ${url}: ${response.status} ${response.statusText}`);
    }

    try {
      await pipeline(Readable.fromWeb(response.body), createWriteStream(targetPath));
      const { size } = await stat(targetPath);
      this.logger.log(`Downloaded ${url} to ${targetPath} (${size} bytes)`);
      return { path: targetPath, byteSize: size };
    } catch (err) {
      throw new DownloadError(`Failed to write ${url} to ${targetPath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }
}
