/**
 * 流水线阶段
 */
export enum PipelineStage {
  PENDING = 'pending',
  DOWNLOADING = 'downloading',
  RESAMPLING = 'resampling',
  CHUNKING = 'chunking',
  EXTRACTING_SEGMENT = 'extracting_segment',
  ENCODING_SEGMENT = 'encoding_segment',
  TRANSCRIBING = 'transcribing',
  AGGREGATING = 'aggregating',
  ARCHIVING = 'archiving',
  PERSISTING = 'persisting',
  NOTIFYING = 'notifying',
  COMPLETED = 'completed',
  FAILED = 'failed',
}

/**
 * 本地临时音频文件
 */
export interface AudioAsset {
  path: string;
  byteSize: number;
}

/**
 * 已落盘的分片
 * durationSeconds 为 null 表示分片即整个文件
 */
export interface Segment {
  index: number;
  startSecond: number;
  durationSeconds: number | null;
  path: string;
}

export interface WordTimestamp {
  word: string;
  startTime: number; // 相对分片起点（秒）
  endTime: number;
}

export interface WordConfidence {
  word: string;
  score: number;
}

/**
 * 关键词命中（来自 Deepgram search）
 */
export interface KeywordSpot {
  keyword: string;
  startTime: number;
  endTime: number;
  confidence: number;
  snippet: string;
}

/**
 * 单个分片的转录结果
 */
export interface SegmentResult {
  readonly segmentIndex: number;
  readonly transcript: string;
  readonly wordTimestamps: readonly WordTimestamp[];
  readonly wordConfidences: readonly WordConfidence[];
  readonly keywordSpots: readonly KeywordSpot[];
}

/**
 * 合并后的完整转录
 */
export interface AggregatedTranscription {
  readonly transcript: string;
  readonly audioURL: string | null; // 仅在归档后设置
  readonly completedAt: Date;
  readonly timestamps: readonly WordTimestamp[];
  readonly confidences: readonly WordConfidence[];
  readonly keywords: readonly KeywordSpot[];
}

/**
 * 一次转录请求
 */
export interface TranscriptionRequest {
  audioUrl: string;
  emails: string[];
  keywords: string[];
}
