import {
  AggregatedTranscription,
  SegmentResult,
} from '../../common/interfaces/transcription.interface';

/**
 * 按分片序号合并转录结果
 *
 * - transcript 直接拼接，不加分隔符（每段结果末尾已带空格）
 * - 重叠区间内的重复词不去重
 * - 时间戳保持各分片自身的相对时间，不换算到全局时间轴
 */
export function mergeSegmentResults(
  results: readonly SegmentResult[],
  now: () => Date = () => new Date(),
): AggregatedTranscription {
  const ordered = [...results].sort((a, b) => a.segmentIndex - b.segmentIndex);

  return {
    transcript: ordered.map((r) => r.transcript).join(''),
    audioURL: null,
    completedAt: now(),
    timestamps: ordered.flatMap((r) => r.wordTimestamps),
    confidences: ordered.flatMap((r) => r.wordConfidences),
    keywords: ordered.flatMap((r) => r.keywordSpots),
  };
}

/**
 * 归档后返回带 audioURL 的新对象，原对象不变
 */
export function withAudioUrl(
  transcription: AggregatedTranscription,
  audioURL: string,
): AggregatedTranscription {
  return { ...transcription, audioURL };
}
