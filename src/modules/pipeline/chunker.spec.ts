import {
  BYTES_PER_SECOND,
  CHUNK_DURATION_SECONDS,
  MAX_CHUNK_BYTES,
  OVERLAP_SECONDS,
  countChunks,
  planSegments,
} from './chunker';

describe('chunker', () => {
  it('derives the chunk duration from the resample byte rate', () => {
    expect(BYTES_PER_SECOND).toBe(32000);
    expect(CHUNK_DURATION_SECONDS).toBe(2968);
    expect(OVERLAP_SECONDS).toBe(5);
  });

  describe('countChunks', () => {
    it.each([
      [0, 1],
      [1, 1],
      [50_000_000, 1],
      [MAX_CHUNK_BYTES - 1, 1],
      [MAX_CHUNK_BYTES, 2],
      [190_000_000, 3],
      [300_000_000, 4],
    ])('splits %d bytes into %d chunk(s)', (byteSize, expected) => {
      expect(countChunks(byteSize)).toBe(expected);
    });
  });

  it('plans a single whole-file segment below the size limit', () => {
    expect(planSegments(50_000_000)).toEqual([{ kind: 'whole', index: 0, startSecond: 0 }]);
  });

  it('plans a single segment for an empty file', () => {
    expect(planSegments(0)).toHaveLength(1);
  });

  it('plans overlapping windows for a 300MB file', () => {
    const plan = planSegments(300_000_000);

    expect(plan).toEqual([
      { kind: 'window', index: 0, startSecond: 0, durationSeconds: 2968 },
      { kind: 'window', index: 1, startSecond: 2963, durationSeconds: 2968 },
      { kind: 'window', index: 2, startSecond: 5931, durationSeconds: 2968 },
      { kind: 'window', index: 3, startSecond: 8899, durationSeconds: 2968 },
    ]);
  });

  it('starts every later window one overlap before its nominal boundary', () => {
    const plan = planSegments(800_000_000);

    expect(plan).toHaveLength(9);
    plan.forEach((window, index) => {
      expect(window.index).toBe(index);
      expect(window.kind).toBe('window');
      if (window.kind === 'window') {
        expect(window.durationSeconds).toBe(CHUNK_DURATION_SECONDS);
        expect(window.startSecond).toBe(index === 0 ? 0 : index * CHUNK_DURATION_SECONDS - OVERLAP_SECONDS);
      }
    });
  });

  it('returns an identical plan for the same size', () => {
    expect(planSegments(210_000_000)).toEqual(planSegments(210_000_000));
  });
});
