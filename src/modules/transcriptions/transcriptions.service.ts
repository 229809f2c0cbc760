import { Injectable, Logger } from '@nestjs/common';
import { SupabaseService } from '../../providers/supabase/supabase.service';
import { TranscriptionRecord } from '../../database/entities';
import { AggregatedTranscription } from '../../common/interfaces/transcription.interface';
import { PersistenceError } from '../../common/errors/pipeline.errors';

const TABLE = 'transcriptions';

export function toTranscriptionRecord(
  taskId: string,
  transcription: AggregatedTranscription,
  createdAt: Date = new Date(),
): TranscriptionRecord {
  return {
    task_id: taskId,
    transcript: transcription.transcript,
    audio_url: transcription.audioURL,
    completed_at: transcription.completedAt.toISOString(),
    timestamps: [...transcription.timestamps],
    confidences: [...transcription.confidences],
    keywords: [...transcription.keywords],
    created_at: createdAt.toISOString(),
  };
}

@Injectable()
export class TranscriptionsService {
  private readonly logger = new Logger(TranscriptionsService.name);

  constructor(private supabaseService: SupabaseService) {}

  isAvailable(): boolean {
    return this.supabaseService.isAvailable();
  }

  /**
   * 保存合并后的转录结果
   */
  async persist(taskId: string, transcription: AggregatedTranscription): Promise<void> {
    const record = toTranscriptionRecord(taskId, transcription);

    const { error } = await this.supabaseService.getClient().from(TABLE).insert(record);

    if (error) {
      this.logger.error(`Failed to save transcription: ${error.message}`);
      throw new PersistenceError(`Failed to save transcription ${taskId}: ${error.message}`, { cause: error });
    }

    this.logger.log(`Saved transcription for task ${taskId}`);
  }

  /**
   * 按任务 ID 查询转录结果
   */
  async findByTaskId(taskId: string): Promise<TranscriptionRecord | null> {
    const { data, error } = await this.supabaseService
      .getClient()
      .from(TABLE)
      .select('*')
      .eq('task_id', taskId)
      .maybeSingle<TranscriptionRecord>();

    if (error) {
      this.logger.error(`Failed to fetch transcription ${taskId}: ${error.message}`);
      throw new PersistenceError(`Failed to fetch transcription ${taskId}: ${error.message}`, { cause: error });
    }

    return data;
  }
}
