import { BeforeApplicationShutdown, Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { mkdir, mkdtemp } from 'fs/promises';
import { basename, join } from 'path';
import { PIPELINE_CONFIG, PipelineConfig } from '../../common/config/pipeline.config';
import {
  ArchiveError,
  CancelledError,
  DownloadError,
  ExtractionError,
  NotificationError,
  PersistenceError,
  PipelineErrorClass,
  TaskAlreadyRunningError,
  TranscodeError,
  TranscriptionError,
  errorMessage,
} from '../../common/errors/pipeline.errors';
import {
  AggregatedTranscription,
  AudioAsset,
  PipelineStage,
  Segment,
  SegmentResult,
  TranscriptionRequest,
} from '../../common/interfaces/transcription.interface';
import { mapWithConcurrency } from '../../common/utils/ordered-pool';
import { DeepgramService } from '../../providers/deepgram/deepgram.service';
import { DownloaderService, localFileName } from '../../providers/downloader/downloader.service';
import { FfmpegService } from '../../providers/ffmpeg/ffmpeg.service';
import { MailService } from '../../providers/mail/mail.service';
import { R2Service } from '../../providers/r2/r2.service';
import { TranscriptionsService } from '../transcriptions/transcriptions.service';
import { mergeSegmentResults, withAudioUrl } from './aggregator';
import { ArtifactScope, withArtifactScope } from './artifact-scope';
import { SegmentWindow, TimeWindow, planSegments } from './chunker';
import { SegmentExtractorService, wholeFileSegment } from './segment-extractor.service';

/**
 * 一次任务的两段式入口：run 执行流水线，onFailure 发送失败通知
 */
export interface TranscriptionTask {
  run(taskId: string): Promise<void>;
  onFailure(taskId: string, message: string): Promise<void>;
}

interface TaskContext {
  taskId: string;
  request: TranscriptionRequest;
  signal: AbortSignal;
}

interface RunningTask {
  controller: AbortController;
  done: Promise<void>;
}

interface StageStep {
  stage: PipelineStage;
  segmentIndex?: number;
}

function describeStep(step: StageStep): string {
  return step.segmentIndex === undefined ? step.stage : `${step.stage} segment ${step.segmentIndex}`;
}

function successBody(transcription: AggregatedTranscription, persisted: boolean): string {
  const header = ['The transcript is below.'];
  if (persisted) {
    header.push('It can also be found in the database.');
  }
  if (transcription.audioURL) {
    header.push(`Source audio: ${transcription.audioURL}`);
  }
  return `${header.join('\n')}\n\n${transcription.transcript}`;
}

/**
 * 转录流水线
 *
 * downloading → resampling → chunking → (extracting_segment → encoding_segment → transcribing)*
 * → aggregating → archiving? → persisting? → notifying
 *
 * 每个阶段产生的临时文件在创建时登记到 ArtifactScope，任务结束（成功或失败）时全部删除。
 * 分片文件在该分片转录返回后立即删除。
 */
@Injectable()
export class PipelineService implements OnModuleDestroy, BeforeApplicationShutdown {
  private readonly logger = new Logger(PipelineService.name);
  private readonly running = new Map<string, RunningTask>();

  constructor(
    @Inject(PIPELINE_CONFIG) private readonly config: PipelineConfig,
    private readonly downloaderService: DownloaderService,
    private readonly ffmpegService: FfmpegService,
    private readonly segmentExtractor: SegmentExtractorService,
    private readonly deepgramService: DeepgramService,
    private readonly r2Service: R2Service,
    private readonly transcriptionsService: TranscriptionsService,
    private readonly mailService: MailService,
  ) {}

  createTask(request: TranscriptionRequest): TranscriptionTask {
    return {
      run: (taskId) => this.run(taskId, request),
      onFailure: (taskId, message) => this.notifyFailure(taskId, request.emails, message),
    };
  }

  /**
   * 执行任务，失败时发送失败通知后重新抛出（交给队列记录）
   */
  async execute(taskId: string, request: TranscriptionRequest): Promise<void> {
    const task = this.createTask(request);
    try {
      await task.run(taskId);
    } catch (error) {
      // 重复提交不是任务失败，原任务仍在运行，不发失败通知
      if (error instanceof TaskAlreadyRunningError) throw error;
      this.logger.error(`Task ${taskId} failed: ${error}`);
      await task.onFailure(taskId, String(error));
      throw error;
    }
  }

  /**
   * 取消运行中的任务，在下一个阶段边界生效
   */
  cancel(taskId: string, reason = 'cancelled by request'): boolean {
    const task = this.running.get(taskId);
    if (!task) return false;
    task.controller.abort(reason);
    return true;
  }

  isRunning(taskId: string): boolean {
    return this.running.has(taskId);
  }

  onModuleDestroy() {
    for (const taskId of this.running.keys()) {
      this.logger.warn(`Aborting task ${taskId} on shutdown`);
      this.cancel(taskId, 'worker shutting down');
    }
  }

  /**
   * 等待被中止的任务释放临时文件后再退出
   */
  async beforeApplicationShutdown() {
    await Promise.allSettled([...this.running.values()].map((task) => task.done));
  }

  private run(taskId: string, request: TranscriptionRequest): Promise<void> {
    if (this.running.has(taskId)) {
      return Promise.reject(new TaskAlreadyRunningError(taskId));
    }

    const controller = new AbortController();
    const timeoutMinutes = Math.round(this.config.taskTimeoutMs / 60000);
    const timeout = setTimeout(
      () => controller.abort(`timed out after ${timeoutMinutes} minutes`),
      this.config.taskTimeoutMs,
    );
    timeout.unref();

    const ctx: TaskContext = { taskId, request, signal: controller.signal };
    this.logger.log(`[task ${taskId}] ${PipelineStage.PENDING}: ${request.audioUrl}`);

    const done = this.runStages(ctx).finally(() => {
      clearTimeout(timeout);
      this.running.delete(taskId);
    });
    this.running.set(taskId, { controller, done });
    return done;
  }

  private async runStages(ctx: TaskContext): Promise<void> {
    const transcription = await this.transcribe(ctx);
    await this.notifySuccess(ctx, transcription);
    this.logger.log(`[task ${ctx.taskId}] ${PipelineStage.COMPLETED}`);
  }

  private async transcribe(ctx: TaskContext): Promise<AggregatedTranscription> {
    const { taskId, request } = ctx;

    return withArtifactScope(this.logger, `task ${taskId}`, async (scope) => {
      const { workDir, source } = await this.stage(
        ctx,
        { stage: PipelineStage.DOWNLOADING },
        DownloadError,
        async () => {
          await mkdir(this.config.tempDir, { recursive: true });
          const prefix = `${taskId.replace(/[^A-Za-z0-9_-]/g, '_')}-`;
          const dir = scope.trackDirectory(await mkdtemp(join(this.config.tempDir, prefix)));
          const target = scope.track(join(dir, localFileName(request.audioUrl)));
          return {
            workDir: dir,
            source: await this.downloaderService.download(request.audioUrl, target, ctx.signal),
          };
        },
      );

      const wav = await this.stage(ctx, { stage: PipelineStage.RESAMPLING }, TranscodeError, () =>
        this.ffmpegService.resample(source.path, scope.track(`${source.path}.wav`), 'wav', ctx.signal),
      );

      this.enter(ctx, { stage: PipelineStage.CHUNKING });
      const windows = planSegments(wav.byteSize);
      this.logger.log(`[task ${taskId}] split ${wav.byteSize} bytes into ${windows.length} segment(s)`);

      const results = await mapWithConcurrency(windows, this.config.segmentConcurrency, (window) =>
        this.transcribeSegment(ctx, workDir, wav, window),
      );

      this.enter(ctx, { stage: PipelineStage.AGGREGATING });
      const merged = mergeSegmentResults(results);

      const transcription = this.r2Service.isAvailable()
        ? withAudioUrl(
            merged,
            await this.stage(ctx, { stage: PipelineStage.ARCHIVING }, ArchiveError, () =>
              this.r2Service.uploadLocalFile(source.path, `audio/${taskId}/${basename(source.path)}`),
            ),
          )
        : merged;

      if (this.transcriptionsService.isAvailable()) {
        await this.stage(ctx, { stage: PipelineStage.PERSISTING }, PersistenceError, () =>
          this.transcriptionsService.persist(taskId, transcription),
        );
      }

      return transcription;
    });
  }

  /**
   * 单个分片：截取 → 转为 flac → 转录，分片文件在返回前删除
   */
  private transcribeSegment(
    ctx: TaskContext,
    workDir: string,
    wav: AudioAsset,
    window: SegmentWindow,
  ): Promise<SegmentResult> {
    const index = window.index;

    return withArtifactScope(this.logger, `task ${ctx.taskId} segment ${index}`, async (scope) => {
      const segment =
        window.kind === 'window'
          ? await this.extractSegment(ctx, workDir, wav, window, scope)
          : wholeFileSegment(wav.path);

      const upload = await this.stage(
        ctx,
        { stage: PipelineStage.ENCODING_SEGMENT, segmentIndex: index },
        TranscodeError,
        () => this.ffmpegService.resample(segment.path, scope.track(`${segment.path}.flac`), 'flac', ctx.signal),
      );

      return this.stage(
        ctx,
        { stage: PipelineStage.TRANSCRIBING, segmentIndex: index },
        TranscriptionError,
        () => this.deepgramService.transcribeFile(upload.path, ctx.request.keywords, index, ctx.signal),
      );
    });
  }

  private extractSegment(
    ctx: TaskContext,
    workDir: string,
    wav: AudioAsset,
    window: TimeWindow,
    scope: ArtifactScope,
  ): Promise<Segment> {
    return this.stage(
      ctx,
      { stage: PipelineStage.EXTRACTING_SEGMENT, segmentIndex: window.index },
      ExtractionError,
      () => {
        const target = scope.track(join(workDir, `segment-${window.index}-${Date.now()}.wav`));
        return this.segmentExtractor.extract(wav.path, window, target, ctx.signal);
      },
    );
  }

  private async notifySuccess(ctx: TaskContext, transcription: AggregatedTranscription): Promise<void> {
    const { taskId, request } = ctx;
    const channel = this.config.mail?.success;
    if (!channel || request.emails.length === 0) {
      this.enter(ctx, { stage: PipelineStage.NOTIFYING });
      this.logger.log(`[task ${taskId}] success notification skipped (mail not configured or no recipients)`);
      return;
    }

    await this.stage(ctx, { stage: PipelineStage.NOTIFYING }, NotificationError, () =>
      this.mailService.send(
        channel,
        request.emails,
        `Transcription ${taskId} Complete`,
        successBody(transcription, this.transcriptionsService.isAvailable()),
      ),
    );
  }

  /**
   * 失败通知尽力而为：发送失败只记日志，不再抛出
   */
  private async notifyFailure(taskId: string, emails: readonly string[], message: string): Promise<void> {
    this.logger.warn(`[task ${taskId}] ${PipelineStage.FAILED}: ${message}`);

    const channel = this.config.mail?.failure;
    if (!channel || emails.length === 0) {
      this.logger.warn(`[task ${taskId}] failure notification skipped (mail not configured or no recipients)`);
      return;
    }

    try {
      await this.mailService.send(channel, emails, `Transcription ${taskId} Failed`, message);
      this.logger.log(`[task ${taskId}] sent failure notification to ${emails.join(', ')}`);
    } catch (error) {
      this.logger.error(
        `[task ${taskId}] could not send failure notification to ${emails.join(', ')}: ${errorMessage(error)}`,
      );
    }
  }

  /**
   * 进入阶段并执行 work，失败时包装为该阶段的错误类型并附带任务 ID
   */
  private async stage<T>(
    ctx: TaskContext,
    step: StageStep,
    errorClass: PipelineErrorClass,
    work: () => Promise<T>,
  ): Promise<T> {
    this.enter(ctx, step);
    try {
      return await work();
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      if (ctx.signal.aborted) throw this.cancelled(ctx, step);
      throw new errorClass(`[task ${ctx.taskId}] ${describeStep(step)}: ${errorMessage(error)}`, {
        cause: error,
        taskId: ctx.taskId,
        stage: step.stage,
      });
    }
  }

  private enter(ctx: TaskContext, step: StageStep): void {
    if (ctx.signal.aborted) {
      throw this.cancelled(ctx, step);
    }
    this.logger.log(`[task ${ctx.taskId}] ${describeStep(step)}`);
  }

  private cancelled(ctx: TaskContext, step: StageStep): CancelledError {
    const reason: unknown = ctx.signal.reason;
    return new CancelledError(`[task ${ctx.taskId}] cancelled at ${describeStep(step)}: ${errorMessage(reason)}`, {
      cause: reason,
      taskId: ctx.taskId,
      stage: step.stage,
    });
  }
}
