import { Injectable, OnModuleInit, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile } from 'fs/promises';
import { extname } from 'path';
import { z } from 'zod';
import { TranscriptionError, errorMessage } from '../../common/errors/pipeline.errors';
import { SegmentResult } from '../../common/interfaces/transcription.interface';

// 不支持 keywords 参数的模型（nova-3 起改用 keyterm）
const MODELS_WITHOUT_KEYWORD_BOOST = ['nova-3'];

const CONTENT_TYPES: Record<string, string> = {
  '.flac': 'audio/flac',
  '.wav': 'audio/wav',
  '.mp3': 'audio/mpeg',
};

const WordSchema = z.object({
  word: z.string(),
  start: z.number(),
  end: z.number(),
  confidence: z.number(),
  punctuated_word: z.string().optional(),
});

// search 参数返回的关键词命中
const SearchSchema = z.object({
  query: z.string(),
  hits: z.array(
    z.object({
      confidence: z.number(),
      start: z.number(),
      end: z.number(),
      snippet: z.string(),
    }),
  ),
});

/**
 * /v1/listen 预录音频响应（只取用到的字段）
 * @see https://developers.deepgram.com/reference/listen-file
 */
export const ListenResponseSchema = z.object({
  metadata: z
    .object({
      request_id: z.string().optional(),
      duration: z.number().optional(),
    })
    .optional(),
  results: z.object({
    channels: z.array(
      z.object({
        search: z.array(SearchSchema).optional(),
        alternatives: z.array(
          z.object({
            transcript: z.string(),
            confidence: z.number().optional(),
            words: z.array(WordSchema).default([]),
          }),
        ),
      }),
    ),
  }),
});

export type ListenResponse = z.infer<typeof ListenResponseSchema>;

/**
 * 将 Deepgram 响应转换为分片结果
 * 非空 transcript 末尾保留一个空格，合并时直接拼接
 */
export function toSegmentResult(response: ListenResponse, segmentIndex: number): SegmentResult {
  const channel = response.results.channels[0];
  const alternative = channel?.alternatives[0];
  const words = alternative?.words ?? [];
  const text = alternative?.transcript.trim() ?? '';

  return {
    segmentIndex,
    transcript: text ? `${text} ` : '',
    wordTimestamps: words.map((w) => ({ word: w.word, startTime: w.start, endTime: w.end })),
    wordConfidences: words.map((w) => ({ word: w.word, score: w.confidence })),
    keywordSpots: (channel?.search ?? []).flatMap((search) =>
      search.hits.map((hit) => ({
        keyword: search.query,
        startTime: hit.start,
        endTime: hit.end,
        confidence: hit.confidence,
        snippet: hit.snippet,
      })),
    ),
  };
}

@Injectable()
export class DeepgramService implements OnModuleInit {
  private readonly logger = new Logger(DeepgramService.name);
  private apiKey = '';
  private model = 'nova-2';
  private readonly baseUrl = 'https://api.deepgram.com/v1';

  constructor(private configService: ConfigService) {}

  onModuleInit() {
    this.apiKey = this.configService.get<string>('deepgram.apiKey') || '';
    this.model = this.configService.get<string>('deepgram.model') || 'nova-2';
    if (!this.apiKey) {
      this.logger.warn('Deepgram API key not configured');
    } else {
      this.logger.log(`Deepgram service initialized (model ${this.model})`);
    }
  }

  /**
   * 上传本地分片文件进行同步转录
   * 每个关键词同时作为 search（返回命中）和 keywords（提升识别）参数
   */
  async transcribeFile(
    filePath: string,
    keywords: readonly string[],
    segmentIndex: number,
    signal?: AbortSignal,
  ): Promise<SegmentResult> {
    if (!this.apiKey) {
      throw new TranscriptionError('Deepgram API key not configured');
    }

    const params = new URLSearchParams({
      model: this.model,
      punctuate: 'true', // 添加标点
    });
    const boostKeywords = !MODELS_WITHOUT_KEYWORD_BOOST.includes(this.model);
    for (const keyword of keywords) {
      params.append('search', keyword);
      if (boostKeywords) {
        params.append('keywords', keyword);
      }
    }

    let payload: unknown;
    try {
      const body = await readFile(filePath);
      const response = await fetch(`${this.baseUrl}/listen?${params.toString()}`, {
        method: 'POST',
        headers: {
          Authorization: `Token ${this.apiKey}`,
          'Content-Type': CONTENT_TYPES[extname(filePath).toLowerCase()] || 'application/octet-stream',
        },
        body,
        signal,
      });

      if (!response.ok) {
        const error = await response.text();
        throw new TranscriptionError(`Deepgram API error: ${response.status} - ${error}`);
      }
      payload = await response.json();
    } catch (err) {
      if (err instanceof TranscriptionError) throw err;
      throw new TranscriptionError(`Deepgram request failed for ${filePath}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const parsed = ListenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new TranscriptionError(`Unexpected Deepgram response: ${parsed.error.message}`, {
        cause: parsed.error,
      });
    }

    const result = toSegmentResult(parsed.data, segmentIndex);
    this.logger.log(
      `Deepgram response: segment=${segmentIndex}, duration=${parsed.data.metadata?.duration ?? 0}s, ` +
        `words=${result.wordTimestamps.length}, keyword hits=${result.keywordSpots.length}`,
    );
    return result;
  }
}
