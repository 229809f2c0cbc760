export const TRANSCRIPTIONS_QUEUE = 'transcriptions';
export const TRANSCRIBE_JOB = 'transcribe';
