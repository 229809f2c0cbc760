import {
  RESAMPLE_BIT_DEPTH,
  RESAMPLE_CHANNELS,
  RESAMPLE_SAMPLE_RATE,
} from '../../providers/ffmpeg/ffmpeg.constants';

/** 转录服务单次请求的文件大小上限（留出余量） */
export const MAX_CHUNK_BYTES = 95_000_000;

/** 非首个分片向前重叠的秒数，避免边界处丢词 */
export const OVERLAP_SECONDS = 5;

/** 重采样后 WAV 每秒字节数：16000 * 16 * 1 / 8 = 32000 */
export const BYTES_PER_SECOND = (RESAMPLE_SAMPLE_RATE * RESAMPLE_BIT_DEPTH * RESAMPLE_CHANNELS) / 8;

/**
 * 一个满额分片的时长（秒），由字节率推导一次：floor(95000000 / 32000) = 2968
 * 不按实际文件重新计算
 */
export const CHUNK_DURATION_SECONDS = Math.floor(MAX_CHUNK_BYTES / BYTES_PER_SECOND);

export interface WholeFileWindow {
  kind: 'whole';
  index: 0;
  startSecond: 0;
}

export interface TimeWindow {
  kind: 'window';
  index: number;
  startSecond: number;
  durationSeconds: number;
}

export type SegmentWindow = WholeFileWindow | TimeWindow;

/**
 * 分片数 = byteSize / MAX_CHUNK_BYTES + 1（整除）
 * 永远不为 0：空文件也是 1 片。重叠的秒数不会单独多出一片。
 */
export function countChunks(byteSize: number): number {
  return Math.floor(byteSize / MAX_CHUNK_BYTES) + 1;
}

/**
 * 根据重采样后文件的字节数规划分片
 * 只有 1 片时返回覆盖整个文件的描述，下游跳过切割
 */
export function planSegments(byteSize: number): SegmentWindow[] {
  const numChunks = countChunks(byteSize);
  if (numChunks === 1) {
    return [{ kind: 'whole', index: 0, startSecond: 0 }];
  }

  return Array.from({ length: numChunks }, (_, index): TimeWindow => ({
    kind: 'window',
    index,
    startSecond: index === 0 ? 0 : index * CHUNK_DURATION_SECONDS - OVERLAP_SECONDS,
    durationSeconds: CHUNK_DURATION_SECONDS,
  }));
}
