import { Product } from '@retail-insights/database';
import { ChatLogService } from '../chat-log/chat-log.service';
import { InsightsController } from './insights.controller';
import { InsightsService } from './insights.service';

describe('InsightsController', () => {
  let insights: { explain: jest.Mock; insertProduct: jest.Mock; reviseDescription: jest.Mock };
  let chatLog: { recent: jest.Mock };
  let controller: InsightsController;

  const inserted: Product = {
    id: 12,
    name: 'Organic Almond Milk',
    description: 'Creamy almond milk.',
    embedding: [0.1, 0.2, 0.3],
    createdAt: new Date('2026-05-01T00:00:00Z'),
    updatedAt: new Date('2026-05-01T00:00:00Z'),
  };

  beforeEach(() => {
    insights = { explain: jest.fn(), insertProduct: jest.fn(), reviseDescription: jest.fn() };
    chatLog = { recent: jest.fn().mockResolvedValue([]) };
    controller = new InsightsController(
      insights as unknown as InsightsService,
      chatLog as unknown as ChatLogService,
    );
  });

  it('passes product name and question to the explain flow', async () => {
    insights.explain.mockResolvedValue({ answer: 'ok' });

    await controller.explain({ productName: 'Organic Almond Milk', question: 'Is it sweet?' });

    expect(insights.explain).toHaveBeenCalledWith('Organic Almond Milk', 'Is it sweet?');
  });

  it('returns the inserted product without the raw vector', async () => {
    insights.insertProduct.mockResolvedValue(inserted);

    const result = await controller.create({ name: 'Organic Almond Milk' });

    expect(result).toEqual({
      id: 12,
      name: 'Organic Almond Milk',
      description: 'Creamy almond milk.',
      createdAt: inserted.createdAt,
      updatedAt: inserted.updatedAt,
      embeddingDimensions: 3,
    });
  });

  it('parses the log limit', async () => {
    await controller.log('5');
    await controller.log();

    expect(chatLog.recent).toHaveBeenNthCalledWith(1, 5);
    expect(chatLog.recent).toHaveBeenNthCalledWith(2, undefined);
  });
});
