import { KeywordSpot, WordConfidence, WordTimestamp } from '../../common/interfaces/transcription.interface';

/**
 * 转录结果实体（对应 transcriptions 表）
 */
export interface TranscriptionRecord {
  task_id: string; // PK
  transcript: string;
  audio_url: string | null; // R2 中的源音频 URL，未归档时为 null
  completed_at: string;
  timestamps: WordTimestamp[]; // jsonb，各分片内的相对时间
  confidences: WordConfidence[]; // jsonb
  keywords: KeywordSpot[]; // jsonb
  created_at: string;
}
