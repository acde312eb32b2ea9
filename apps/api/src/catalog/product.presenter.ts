import { Product } from '@retail-insights/database';

export type PresentedProduct = Omit<Product, 'embedding'> & { embeddingDimensions: number };

// The raw vector is not useful to a client; report its width instead
export function presentProduct(product: Product): PresentedProduct {
  const { embedding, ...rest } = product;
  return { ...rest, embeddingDimensions: embedding?.length ?? 0 };
}
