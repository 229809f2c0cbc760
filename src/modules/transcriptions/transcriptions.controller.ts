import { Controller, Get, NotFoundException, Param, ServiceUnavailableException } from '@nestjs/common';
import { TranscriptionsService } from './transcriptions.service';
import { TranscriptionRecord } from '../../database/entities';
import { ErrorCode } from '../../common/interfaces/response.interface';

@Controller('transcriptions')
export class TranscriptionsController {
  constructor(private readonly transcriptionsService: TranscriptionsService) {}

  /**
   * GET /api/transcriptions/:taskId
   * 获取已保存的转录结果
   */
  @Get(':taskId')
  async getTranscription(@Param('taskId') taskId: string): Promise<TranscriptionRecord> {
    if (!this.transcriptionsService.isAvailable()) {
      throw new ServiceUnavailableException({
        code: ErrorCode.STORAGE_DISABLED,
        message: 'Transcription storage is not configured',
      });
    }

    const record = await this.transcriptionsService.findByTaskId(taskId);
    if (!record) {
      throw new NotFoundException({
        code: ErrorCode.NOT_FOUND,
        message: `Transcription ${taskId} not found`,
      });
    }
    return record;
  }
}
