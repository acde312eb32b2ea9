export * from './entities/product.entity';
export * from './entities/chat-log.entity';

export type { ProductSummary, GeneratedProductContent, ProductInsight } from './types/catalog.types';
export * from './constants/generation';
