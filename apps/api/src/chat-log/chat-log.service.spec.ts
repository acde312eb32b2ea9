import { ObjectLiteral, Repository } from 'typeorm';
import { ChatLog } from '@retail-insights/database';
import { ChatLogService } from './chat-log.service';

type MockedRepository<T extends ObjectLiteral> = Partial<Record<keyof Repository<T>, jest.Mock>> & {
  create: jest.Mock;
  save: jest.Mock;
  find: jest.Mock;
};

describe('ChatLogService', () => {
  let repo: MockedRepository<ChatLog>;
  let service: ChatLogService;

  beforeEach(() => {
    repo = { create: jest.fn(), save: jest.fn(), find: jest.fn().mockResolvedValue([]) };
    repo.create.mockImplementation((entity) => entity as ChatLog);
    repo.save.mockImplementation(async (entity) => ({
      id: 11,
      timestamp: new Date('2026-03-01T10:00:00Z'),
      ...entity,
    }));
    service = new ChatLogService(repo as unknown as Repository<ChatLog>);
  });

  it('appends exactly one row with the literal query and response', async () => {
    const entry = await service.append('Oat Crunch Granola', 'A crunchy breakfast cereal.');

    expect(repo.create).toHaveBeenCalledWith({ query: 'Oat Crunch Granola', response: 'A crunchy breakfast cereal.' });
    expect(repo.save).toHaveBeenCalledTimes(1);
    expect(entry).toEqual({
      id: 11,
      timestamp: new Date('2026-03-01T10:00:00Z'),
      query: 'Oat Crunch Granola',
      response: 'A crunchy breakfast cereal.',
    });
  });

  it('propagates write failures', async () => {
    repo.save.mockRejectedValue(new Error('disk full'));

    await expect(service.append('q', 'r')).rejects.toThrow('disk full');
  });

  it('returns newest entries first with a default page', async () => {
    await service.recent();

    expect(repo.find).toHaveBeenCalledWith({ order: { timestamp: 'DESC', id: 'DESC' }, take: 20 });
  });

  it('clamps the page size', async () => {
    await service.recent(500);
    await service.recent(-3);

    expect(repo.find).toHaveBeenNthCalledWith(1, expect.objectContaining({ take: 100 }));
    expect(repo.find).toHaveBeenNthCalledWith(2, expect.objectContaining({ take: 1 }));
  });

  it('treats a zero limit as one entry', async () => {
    await service.recent(0);

    expect(repo.find).toHaveBeenCalledWith({ order: { timestamp: 'DESC', id: 'DESC' }, take: 1 });
  });

  it('falls back to the default page for a non-numeric limit', async () => {
    await service.recent(Number.NaN);

    expect(repo.find).toHaveBeenCalledWith(expect.objectContaining({ take: 20 }));
  });
});
