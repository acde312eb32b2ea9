import type { Product } from '../entities/product.entity';

export type ProductSummary = Pick<Product, 'id' | 'name' | 'description'>;

export interface GeneratedProductContent {
  description: string;
  embedding: number[];
}

export interface ProductInsight {
  productName: string;
  description: string;
  answer: string;
  loggedAt: Date;
}
