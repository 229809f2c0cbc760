import { PipelineStage } from '../interfaces/transcription.interface';

/**
 * 流水线错误码
 */
export enum PipelineErrorCode {
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  TRANSCODE_FAILED = 'TRANSCODE_FAILED',
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',
  TRANSCRIPTION_FAILED = 'TRANSCRIPTION_FAILED',
  ARCHIVE_FAILED = 'ARCHIVE_FAILED',
  PERSISTENCE_FAILED = 'PERSISTENCE_FAILED',
  NOTIFICATION_FAILED = 'NOTIFICATION_FAILED',
  CANCELLED = 'CANCELLED',
}

export interface PipelineErrorOptions {
  cause?: unknown;
  taskId?: string;
  stage?: PipelineStage;
}

/**
 * 流水线错误基类
 * String(error) 的结果即失败通知邮件正文
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  readonly taskId?: string;
  readonly stage?: PipelineStage;

  constructor(message: string, options: PipelineErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.taskId = options.taskId;
    this.stage = options.stage;
  }
}

export type PipelineErrorClass = new (message: string, options?: PipelineErrorOptions) => PipelineError;

export class DownloadError extends PipelineError {
  readonly code = PipelineErrorCode.DOWNLOAD_FAILED;
}

export class TranscodeError extends PipelineError {
  readonly code = PipelineErrorCode.TRANSCODE_FAILED;
}

export class ExtractionError extends PipelineError {
  readonly code = PipelineErrorCode.EXTRACTION_FAILED;
}

export class TranscriptionError extends PipelineError {
  readonly code = PipelineErrorCode.TRANSCRIPTION_FAILED;
}

export class ArchiveError extends PipelineError {
  readonly code = PipelineErrorCode.ARCHIVE_FAILED;
}

export class PersistenceError extends PipelineError {
  readonly code = PipelineErrorCode.PERSISTENCE_FAILED;
}

export class NotificationError extends PipelineError {
  readonly code = PipelineErrorCode.NOTIFICATION_FAILED;
}

export class CancelledError extends PipelineError {
  readonly code = PipelineErrorCode.CANCELLED;
}

/**
 * 同一任务 ID 重复提交；不属于流水线失败
 */
export class TaskAlreadyRunningError extends Error {
  constructor(readonly taskId: string) {
    super(`Task ${taskId} is already running`);
    this.name = new.target.name;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
