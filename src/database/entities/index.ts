export * from './transcription.entity';
