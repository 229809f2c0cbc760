import { Test } from '@nestjs/testing';
import { PersistenceError } from '../../common/errors/pipeline.errors';
import { AggregatedTranscription } from '../../common/interfaces/transcription.interface';
import { SupabaseService } from '../../providers/supabase/supabase.service';
import { TranscriptionsService, toTranscriptionRecord } from './transcriptions.service';

const transcription: AggregatedTranscription = {
  transcript: 'hello world ',
  audioURL: 'https://cdn.test/audio/t1/a.mp3-1',
  completedAt: new Date('2026-03-04T05:06:07.000Z'),
  timestamps: [{ word: 'hello', startTime: 0, endTime: 0.4 }],
  confidences: [{ word: 'hello', score: 0.9 }],
  keywords: [],
};

describe('toTranscriptionRecord', () => {
  it('maps the aggregated transcription onto a row', () => {
    expect(toTranscriptionRecord('t1', transcription, new Date('2026-03-04T05:06:08.000Z'))).toEqual({
      task_id: 't1',
      transcript: 'hello world ',
      audio_url: 'https://cdn.test/audio/t1/a.mp3-1',
      completed_at: '2026-03-04T05:06:07.000Z',
      timestamps: [{ word: 'hello', startTime: 0, endTime: 0.4 }],
      confidences: [{ word: 'hello', score: 0.9 }],
      keywords: [],
      created_at: '2026-03-04T05:06:08.000Z',
    });
  });
});

describe('TranscriptionsService', () => {
  const insert = jest.fn();
  const maybeSingle = jest.fn();
  const eq = jest.fn(() => ({ maybeSingle }));
  const select = jest.fn(() => ({ eq }));
  const from = jest.fn(() => ({ insert, select }));
  let service: TranscriptionsService;

  beforeEach(async () => {
    jest.clearAllMocks();
    const moduleRef = await Test.createTestingModule({
      providers: [
        TranscriptionsService,
        {
          provide: SupabaseService,
          useValue: { isAvailable: () => true, getClient: () => ({ from }) },
        },
      ],
    }).compile();
    service = moduleRef.get(TranscriptionsService);
  });

  it('inserts one row into transcriptions', async () => {
    insert.mockResolvedValue({ error: null });

    await service.persist('t1', transcription);

    expect(from).toHaveBeenCalledWith('transcriptions');
    expect(insert).toHaveBeenCalledTimes(1);
    expect(insert.mock.calls[0][0]).toMatchObject({ task_id: 't1', transcript: 'hello world ' });
  });

  it('raises PersistenceError when the insert fails', async () => {
    insert.mockResolvedValue({ error: { message: 'duplicate key value' } });

    const attempt = service.persist('t1', transcription);

    await expect(attempt).rejects.toBeInstanceOf(PersistenceError);
    await expect(attempt).rejects.toThrow('Failed to save transcription t1: duplicate key value');
  });

  it('looks a transcription up by task id', async () => {
    maybeSingle.mockResolvedValue({ data: null, error: null });

    await expect(service.findByTaskId('missing')).resolves.toBeNull();
    expect(eq).toHaveBeenCalledWith('task_id', 'missing');
  });
});
