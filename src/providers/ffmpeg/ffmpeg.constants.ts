/**
 * 重采样参数（16kHz / 16bit / 单声道）
 * 分片时长由这里推导，修改任一项都会改变 CHUNK_DURATION_SECONDS
 */
export const RESAMPLE_SAMPLE_RATE = 16000;
export const RESAMPLE_BIT_DEPTH = 16;
export const RESAMPLE_CHANNELS = 1;

export type AudioFormat = 'wav' | 'flac';

export const AUDIO_CODECS: Record<AudioFormat, string> = {
  wav: 'pcm_s16le',
  flac: 'flac',
};
