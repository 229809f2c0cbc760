import { Processor, WorkerHost, OnWorkerEvent } from '@nestjs/bullmq';
import { Logger } from '@nestjs/common';
import { Job } from 'bullmq';
import { PipelineService } from '../pipeline/pipeline.service';
import { TranscribeJobData, toTranscriptionRequest } from './tasks.service';
import { TRANSCRIPTIONS_QUEUE } from './constants';

@Processor(TRANSCRIPTIONS_QUEUE)
export class TasksProcessor extends WorkerHost {
  private readonly logger = new Logger(TasksProcessor.name);

  constructor(private pipelineService: PipelineService) {
    super();
  }

  async process(job: Job<TranscribeJobData>): Promise<void> {
    await this.pipelineService.execute(job.data.task_id, toTranscriptionRequest(job.data));
  }

  @OnWorkerEvent('failed')
  onFailed(job: Job<TranscribeJobData>, error: Error) {
    this.logger.error(`Job ${job.id} failed: ${error.message}`);
  }
}
