import { GenerationFailedException } from '../common/generation-failed.exception';
import { EmbeddingService } from './embedding.service';
import { InsightGeneratorService } from './insight-generator.service';
import { LlmService } from './llm.service';

describe('InsightGeneratorService', () => {
  let llm: { complete: jest.Mock };
  let embeddings: { embed: jest.Mock };
  let service: InsightGeneratorService;

  beforeEach(() => {
    llm = { complete: jest.fn() };
    embeddings = { embed: jest.fn() };
    service = new InsightGeneratorService(
      llm as unknown as LlmService,
      embeddings as unknown as EmbeddingService,
    );
  });

  it('explains a product from its stored description', async () => {
    llm.complete.mockResolvedValue('A rich, dairy-free milk for cereal and coffee.');

    const answer = await service.explainProduct('Unsweetened almond milk.');

    expect(answer).toBe('A rich, dairy-free milk for cereal and coffee.');
    expect(llm.complete).toHaveBeenCalledWith(
      'Explain the following product for a customer: Unsweetened almond milk.',
      { maxTokens: 100, temperature: 0.5 },
    );
  });

  it('adds the customer question to the prompt', async () => {
    llm.complete.mockResolvedValue('Yes, it is nut based.');

    await service.explainProduct('Unsweetened almond milk.', '  Does it contain nuts? ');

    expect(llm.complete).toHaveBeenCalledWith(
      'Explain the following product for a customer: Unsweetened almond milk.\nCustomer question: Does it contain nuts?',
      { maxTokens: 100, temperature: 0.5 },
    );
  });

  it('generates a bounded description and embeds it', async () => {
    llm.complete.mockResolvedValue(
      '"Creamy organic almond milk, unsweetened, perfect for smoothies, coffee, and cereal bowls every morning."',
    );
    embeddings.embed.mockResolvedValue(new Array(384).fill(0.01));

    const result = await service.describeNewProduct('Organic Almond Milk');

    expect(llm.complete).toHaveBeenCalledWith('Write a 10-word product description for: Organic Almond Milk', {
      maxTokens: 50,
      temperature: 0.7,
    });
    expect(result.description).toBe('Creamy organic almond milk, unsweetened, perfect for smoothies, coffee, and');
    expect(result.description.split(' ')).toHaveLength(10);
    expect(embeddings.embed).toHaveBeenCalledWith(result.description);
    expect(result.embedding).toHaveLength(384);
  });

  it('fails when the model returns only quotes', async () => {
    llm.complete.mockResolvedValue('""');

    await expect(service.describeNewProduct('Organic Almond Milk')).rejects.toBeInstanceOf(GenerationFailedException);
    expect(embeddings.embed).not.toHaveBeenCalled();
  });

  it('surfaces embedding failures after a successful description', async () => {
    llm.complete.mockResolvedValue('Creamy almond milk.');
    embeddings.embed.mockRejectedValue(new GenerationFailedException('embedding', 'timeout'));

    await expect(service.describeNewProduct('Organic Almond Milk')).rejects.toThrow('Embedding request failed: timeout');
  });
});
