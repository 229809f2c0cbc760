import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import { CreateTaskDto } from './create-task.dto';

async function invalidProperties(body: object): Promise<string[]> {
  const errors = await validate(plainToInstance(CreateTaskDto, body));
  return errors.map((e) => e.property);
}

describe('CreateTaskDto', () => {
  it('accepts a url, recipients and keywords', async () => {
    await expect(
      invalidProperties({
        audio_url: 'https://audio.example.com/a.mp3',
        emails: ['a@example.com'],
        keywords: ['budget', 'roadmap'],
      }),
    ).resolves.toEqual([]);
  });

  it('accepts a request without keywords', async () => {
    await expect(
      invalidProperties({ audio_url: 'https://audio.example.com/a.mp3', emails: [] }),
    ).resolves.toEqual([]);
  });

  it('rejects a url without an http scheme', async () => {
    await expect(
      invalidProperties({ audio_url: 'ftp://audio.example.com/a.mp3', emails: ['a@example.com'] }),
    ).resolves.toEqual(['audio_url']);
  });

  it('rejects malformed recipients', async () => {
    await expect(
      invalidProperties({ audio_url: 'https://audio.example.com/a.mp3', emails: ['a@example.com', 'nobody'] }),
    ).resolves.toEqual(['emails']);
  });

  it('rejects empty keywords', async () => {
    await expect(
      invalidProperties({ audio_url: 'https://audio.example.com/a.mp3', emails: [], keywords: [''] }),
    ).resolves.toEqual(['keywords']);
  });
});
