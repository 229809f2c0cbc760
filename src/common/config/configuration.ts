import { tmpdir } from 'os';
import { join } from 'path';

const optionalInt = (value: string | undefined): number | undefined =>
  value ? parseInt(value, 10) : undefined;

export default () => ({
  port: parseInt(process.env.PORT || '3000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',

  // 为空时不校验 X-Api-Key
  apiKey: process.env.API_KEY,

  supabase: {
    url: process.env.SUPABASE_URL,
    serviceRoleKey: process.env.SUPABASE_SERVICE_ROLE_KEY,
  },

  r2: {
    bucket: process.env.R2_BUCKET,
    accessKey: process.env.R2_ACCESS_KEY,
    secretKey: process.env.R2_SECRET_KEY,
    endpoint: process.env.R2_ENDPOINT,
    publicUrl: process.env.R2_PUBLIC_URL,
  },

  redis: {
    enabled: process.env.REDIS_ENABLED === 'true',
    url: process.env.REDIS_URL || 'redis://localhost:6379',
  },

  deepgram: {
    apiKey: process.env.DEEPGRAM_API_KEY,
    model: process.env.DEEPGRAM_MODEL || 'nova-2',
  },

  mail: {
    host: process.env.MAIL_HOST || 'smtp.gmail.com',
    port: parseInt(process.env.MAIL_PORT || '587', 10),
    username: process.env.MAIL_USERNAME,
    password: process.env.MAIL_PASSWORD,
    from: process.env.MAIL_FROM,
    // 失败通知可单独指定 SMTP 服务器，未设置时与成功通知共用
    failureHost: process.env.MAIL_FAILURE_HOST || undefined,
    failurePort: optionalInt(process.env.MAIL_FAILURE_PORT),
  },

  // 流水线配置
  pipeline: {
    tempDir: process.env.PIPELINE_TEMP_DIR || join(tmpdir(), 'transcriptions'),
    segmentConcurrency: parseInt(process.env.PIPELINE_SEGMENT_CONCURRENCY || '1', 10), // 单任务内并发转录的分片数
    taskTimeoutMinutes: parseInt(process.env.PIPELINE_TASK_TIMEOUT_MINUTES || '120', 10),
    staleWorkDirHours: parseInt(process.env.PIPELINE_STALE_WORK_DIR_HOURS || '6', 10),
  },
});
