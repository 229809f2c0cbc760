import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { S3Client, PutObjectCommand } from '@aws-sdk/client-s3';
import { createReadStream, ReadStream } from 'fs';
import { stat } from 'fs/promises';
import { extname } from 'path';
import { ArchiveError, errorMessage } from '../../common/errors/pipeline.errors';

// 根据扩展名推断 Content-Type，未知时按二进制处理
const CONTENT_TYPES: Record<string, string> = {
  '.m4a': 'audio/mp4',
  '.mp4': 'audio/mp4',
  '.webm': 'audio/webm',
  '.opus': 'audio/opus',
  '.mp3': 'audio/mpeg',
  '.ogg': 'audio/ogg',
  '.wav': 'audio/wav',
  '.flac': 'audio/flac',
};

@Injectable()
export class R2Service implements OnModuleInit {
  private readonly logger = new Logger(R2Service.name);
  private client: S3Client | null = null;
  private bucket = '';
  private publicUrl = '';

  constructor(private configService: ConfigService) {}

  onModuleInit() {
    const endpoint = this.configService.get<string>('r2.endpoint');
    const accessKey = this.configService.get<string>('r2.accessKey');
    const secretKey = this.configService.get<string>('r2.secretKey');
    this.bucket = this.configService.get<string>('r2.bucket') || '';
    this.publicUrl = (this.configService.get<string>('r2.publicUrl') || '').replace(/\/+$/, '');

    // 没有公开访问地址时归档结果无法分享，同样视为未配置
    if (!endpoint || !accessKey || !secretKey || !this.bucket || !this.publicUrl) {
      this.logger.warn('R2 configuration missing, audio archival disabled');
      return;
    }

    this.client = new S3Client({
      region: 'auto',
      endpoint,
      credentials: {
        accessKeyId: accessKey,
        secretAccessKey: secretKey,
      },
    });

    this.logger.log('R2 client initialized');
  }

  isAvailable(): boolean {
    return this.client !== null;
  }

  /**
   * 上传本地文件，返回公开访问 URL
   */
  async uploadLocalFile(filePath: string, key: string): Promise<string> {
    if (!this.client) {
      throw new ArchiveError('R2 client not configured');
    }

    let body: ReadStream | null = null;
    try {
      const { size } = await stat(filePath);
      body = createReadStream(filePath);
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.bucket,
          Key: key,
          Body: body,
          ContentLength: size,
          ContentType: this.getContentType(key),
        }),
      );
    } catch (err) {
      body?.destroy();
      throw new ArchiveError(`Failed to upload ${filePath} to ${this.bucket}/${key}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    return `${this.publicUrl}/${key}`;
  }

  getContentType(key: string): string {
    // 文件名带时间戳后缀（a.mp3-1700000000000），去掉后缀再取扩展名
    const name = key.replace(/-\d+$/, '');
    return CONTENT_TYPES[extname(name).toLowerCase()] || 'application/octet-stream';
  }
}
