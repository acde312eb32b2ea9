import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { Product, ProductSummary } from '@retail-insights/database';

@Injectable()
export class CatalogService {
  private readonly logger = new Logger(CatalogService.name);

  constructor(
    @InjectRepository(Product)
    private readonly productRepository: Repository<Product>,
  ) {}

  async listProductNames(): Promise<string[]> {
    const rows = await this.productRepository
      .createQueryBuilder('product')
      .select('DISTINCT product.name', 'name')
      .orderBy('name', 'ASC')
      .getRawMany<{ name: string }>();
    return rows.map((r) => r.name);
  }

  listProducts(): Promise<ProductSummary[]> {
    return this.productRepository.find({
      select: { id: true, name: true, description: true },
      order: { id: 'ASC' },
    });
  }

  findById(id: number): Promise<Product | null> {
    return this.productRepository.findOne({ where: { id } });
  }

  /**
   * Stored description for a product name, or `null` when no such product exists.
   * Names are not unique; the oldest row wins.
   */
  async findDescription(name: string): Promise<string | null> {
    const row = await this.productRepository.findOne({
      select: { id: true, description: true },
      where: { name },
      order: { id: 'ASC' },
    });
    return row?.description ?? null;
  }

  async insertProduct(name: string, description: string, embedding: number[]): Promise<Product> {
    const product = this.productRepository.create({ name, description, embedding });
    const saved = await this.productRepository.save(product);
    this.logger.log(`Inserted product ${saved.id} "${saved.name}"`);
    return saved;
  }

  async updateDescription(product: Product, description: string, embedding: number[]): Promise<Product> {
    product.description = description;
    product.embedding = embedding;
    const saved = await this.productRepository.save(product);
    this.logger.log(`Updated description of product ${saved.id}`);
    return saved;
  }
}
