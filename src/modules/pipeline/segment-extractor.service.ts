import { Injectable } from '@nestjs/common';
import { FfmpegService } from '../../providers/ffmpeg/ffmpeg.service';
import { ExtractionError, errorMessage } from '../../common/errors/pipeline.errors';
import { Segment } from '../../common/interfaces/transcription.interface';
import { TimeWindow } from './chunker';

/**
 * 只有 1 片时分片即重采样后的整个文件，不做切割
 */
export function wholeFileSegment(path: string): Segment {
  return { index: 0, startSecond: 0, durationSeconds: null, path };
}

@Injectable()
export class SegmentExtractorService {
  constructor(private readonly ffmpegService: FfmpegService) {}

  /**
   * 将时间窗口截取为独立文件
   */
  async extract(
    sourcePath: string,
    window: TimeWindow,
    outputPath: string,
    signal?: AbortSignal,
  ): Promise<Segment> {
    try {
      await this.ffmpegService.extract(
        sourcePath,
        outputPath,
        window.startSecond,
        window.durationSeconds,
        signal,
      );
    } catch (err) {
      throw new ExtractionError(
        `Failed to extract segment ${window.index} ` +
          `(${window.startSecond}s +${window.durationSeconds}s) from ${sourcePath}: ${errorMessage(err)}`,
        { cause: err },
      );
    }

    return {
      index: window.index,
      startSecond: window.startSecond,
      durationSeconds: window.durationSeconds,
      path: outputPath,
    };
  }
}
