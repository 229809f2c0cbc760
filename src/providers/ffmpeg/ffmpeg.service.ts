import { Injectable, Logger } from '@nestjs/common';
import ffmpeg from 'fluent-ffmpeg';
import { stat } from 'fs/promises';
import { TranscodeError } from '../../common/errors/pipeline.errors';
import { AudioAsset } from '../../common/interfaces/transcription.interface';
import {
  AUDIO_CODECS,
  AudioFormat,
  RESAMPLE_CHANNELS,
  RESAMPLE_SAMPLE_RATE,
} from './ffmpeg.constants';

/**
 * ffmpeg 适配器
 * 输出路径由调用方决定（调用方负责登记清理）
 */
@Injectable()
export class FfmpegService {
  private readonly logger = new Logger(FfmpegService.name);

  /**
   * 转码为 16kHz 单声道
   * -ar 16000 -ac 1
   */
  async resample(
    inputPath: string,
    outputPath: string,
    format: AudioFormat,
    signal?: AbortSignal,
  ): Promise<AudioAsset> {
    const command = ffmpeg(inputPath)
      .noVideo()
      .audioFrequency(RESAMPLE_SAMPLE_RATE)
      .audioChannels(RESAMPLE_CHANNELS)
      .audioCodec(AUDIO_CODECS[format])
      .format(format)
      .output(outputPath);

    await this.run(command, inputPath, signal);
    return this.describe(outputPath);
  }

  /**
   * 截取 [startSecond, startSecond + durationSeconds) 区间
   * -ss 起始秒, -t 时长
   */
  async extract(
    inputPath: string,
    outputPath: string,
    startSecond: number,
    durationSeconds: number,
    signal?: AbortSignal,
  ): Promise<AudioAsset> {
    const command = ffmpeg(inputPath)
      .setStartTime(startSecond)
      .setDuration(durationSeconds)
      .output(outputPath);

    await this.run(command, inputPath, signal);
    return this.describe(outputPath);
  }

  private run(command: ffmpeg.FfmpegCommand, inputPath: string, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new TranscodeError(`ffmpeg not started on ${inputPath}: aborted`));
        return;
      }

      const onAbort = () => command.kill('SIGKILL');
      signal?.addEventListener('abort', onAbort, { once: true });

      command
        .on('start', (commandLine: string) => {
          this.logger.debug(`Running: ${commandLine}`);
        })
        .on('end', () => {
          signal?.removeEventListener('abort', onAbort);
          resolve();
        })
        .on('error', (err: Error, _stdout: string | null, stderr: string | null) => {
          signal?.removeEventListener('abort', onAbort);
          reject(
            new TranscodeError(
              `ffmpeg failed on ${inputPath}: ${err.message}\nCommand Output:\n${stderr ?? ''}`,
              { cause: err },
            ),
          );
        })
        .run();
    });
  }

  private async describe(path: string): Promise<AudioAsset> {
    try {
      const { size } = await stat(path);
      return { path, byteSize: size };
    } catch (err) {
      throw new TranscodeError(`ffmpeg produced no output at ${path}`, { cause: err });
    }
  }
}
