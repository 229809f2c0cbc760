import { ConfigService } from '@nestjs/config';
import { tmpdir } from 'os';
import { join } from 'path';

export const PIPELINE_CONFIG = Symbol('PIPELINE_CONFIG');

/**
 * SMTP 通道
 */
export interface MailChannel {
  host: string;
  port: number;
  username: string;
  password: string;
  from: string;
}

/**
 * 流水线运行配置
 * 启动时构建一次，注入到 PipelineService，核心逻辑不直接读取环境变量
 * 是否归档/入库由 R2Service、TranscriptionsService 的 isAvailable() 决定
 */
export interface PipelineConfig {
  /** 各任务工作目录的根目录 */
  tempDir: string;
  /** 单任务内同时处理的分片数，1 表示严格顺序 */
  segmentConcurrency: number;
  /** 单任务超时，超时后任务以 CancelledError 失败 */
  taskTimeoutMs: number;
  /** 超过此时长的工作目录视为崩溃遗留 */
  staleWorkDirMs: number;
  /** 未配置邮箱时为 null */
  mail: { success: MailChannel; failure: MailChannel } | null;
}

const HOUR_MS = 60 * 60 * 1000;

export function buildPipelineConfig(configService: ConfigService): PipelineConfig {
  const get = <T>(key: string): T | undefined => configService.get<T>(key);

  const username = get<string>('mail.username');
  const host = get<string>('mail.host');
  let mail: PipelineConfig['mail'] = null;
  if (username && host) {
    const success: MailChannel = {
      host,
      port: get<number>('mail.port') ?? 587,
      username,
      password: get<string>('mail.password') ?? '',
      from: get<string>('mail.from') || username,
    };
    mail = {
      success,
      failure: {
        ...success,
        host: get<string>('mail.failureHost') ?? success.host,
        port: get<number>('mail.failurePort') ?? success.port,
      },
    };
  }

  const taskTimeoutMs = (get<number>('pipeline.taskTimeoutMinutes') || 120) * 60 * 1000;

  return {
    tempDir: get<string>('pipeline.tempDir') || join(tmpdir(), 'transcriptions'),
    segmentConcurrency: Math.max(1, get<number>('pipeline.segmentConcurrency') || 1),
    taskTimeoutMs,
    // 不小于超时 + 1 小时，避免清理仍在运行的任务目录
    staleWorkDirMs: Math.max((get<number>('pipeline.staleWorkDirHours') || 6) * HOUR_MS, taskTimeoutMs + HOUR_MS),
    mail,
  };
}
