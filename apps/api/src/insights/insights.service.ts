import { BadRequestException, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { Product, ProductInsight } from '@retail-insights/database';
import { CatalogService } from '../catalog/catalog.service';
import { ChatLogService } from '../chat-log/chat-log.service';
import { InsightGeneratorService } from '../generator/insight-generator.service';

/**
 * One pass of Catalog Reader -> Insight Generator -> Persistence per user action.
 *
 * Product writes and log writes are independent: nothing here wraps them in a
 * transaction, and a generation failure leaves no row behind.
 */
@Injectable()
export class InsightsService {
  private readonly logger = new Logger(InsightsService.name);

  constructor(
    private readonly catalog: CatalogService,
    private readonly generator: InsightGeneratorService,
    private readonly chatLog: ChatLogService,
  ) {}

  async explain(productName: string, question?: string): Promise<ProductInsight> {
    const description = await this.catalog.findDescription(productName);
    if (description === null) {
      throw new NotFoundException(`Product "${productName}" not found`);
    }

    const answer = await this.generator.explainProduct(description, question);
    const query = question && question.trim() ? question : productName;
    const entry = await this.chatLog.append(query, answer);

    return { productName, description, answer, loggedAt: entry.timestamp };
  }

  async insertProduct(rawName: string): Promise<Product> {
    const name = rawName.trim();
    if (!name) {
      throw new BadRequestException('Please enter a product name.');
    }

    const { description, embedding } = await this.generator.describeNewProduct(name);
    const product = await this.catalog.insertProduct(name, description, embedding);
    this.logger.log(`Generated "${description}" for "${name}" (${embedding.length} dims)`);
    return product;
  }

  async reviseDescription(id: number, rawDescription: string): Promise<Product> {
    const description = rawDescription.trim();
    if (!description) {
      throw new BadRequestException('Please enter a new description.');
    }

    const product = await this.catalog.findById(id);
    if (!product) {
      throw new NotFoundException(`Product ${id} not found`);
    }

    const embedding = await this.generator.embedDescription(description);
    return this.catalog.updateDescription(product, description, embedding);
  }
}
