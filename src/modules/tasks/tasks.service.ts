import { Injectable, Logger, Optional } from '@nestjs/common';
import { InjectQueue } from '@nestjs/bullmq';
import { Queue } from 'bullmq';
import { v4 as uuidv4 } from 'uuid';
import { TranscriptionRequest } from '../../common/interfaces/transcription.interface';
import { PipelineService } from '../pipeline/pipeline.service';
import { CreateTaskDto, CreateTaskResponseDto } from './dto/create-task.dto';
import { TRANSCRIBE_JOB, TRANSCRIPTIONS_QUEUE } from './constants';

export interface TranscribeJobData {
  task_id: string;
  audio_url: string;
  emails: string[];
  keywords: string[];
}

export function toTranscriptionRequest(data: TranscribeJobData): TranscriptionRequest {
  return {
    audioUrl: data.audio_url,
    emails: data.emails,
    keywords: data.keywords,
  };
}

@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);

  constructor(
    private readonly pipelineService: PipelineService,
    // 未启用 Redis 时队列不注册，任务在当前进程内执行
    @Optional() @InjectQueue(TRANSCRIPTIONS_QUEUE) private readonly tasksQueue?: Queue<TranscribeJobData>,
  ) {}

  /**
   * 创建任务
   */
  async createTask(dto: CreateTaskDto): Promise<CreateTaskResponseDto> {
    const taskId = uuidv4();
    const data: TranscribeJobData = {
      task_id: taskId,
      audio_url: dto.audio_url,
      emails: dto.emails,
      keywords: dto.keywords ?? [],
    };

    if (this.tasksQueue) {
      // 失败不自动重试，失败通知已由流水线发出
      await this.tasksQueue.add(TRANSCRIBE_JOB, data, {
        jobId: taskId,
        attempts: 1,
        removeOnComplete: true,
      });
      this.logger.log(`Task created and queued: ${taskId}`);
    } else {
      this.pipelineService.execute(taskId, toTranscriptionRequest(data)).catch((error: unknown) => {
        this.logger.error(`In-process task ${taskId} failed: ${error}`);
      });
      this.logger.log(`Task created and started in process: ${taskId}`);
    }

    return { task_id: taskId, status: 'queued' };
  }
}
