import { DESCRIPTION_MAX_WORDS } from '@retail-insights/database';

export function buildExplainPrompt(description: string, question?: string): string {
  const base = `Explain the following product for a customer: ${description}`;
  const q = question?.trim();
  return q ? `${base}\nCustomer question: ${q}` : base;
}

export function buildDescribePrompt(productName: string): string {
  return `Write a ${DESCRIPTION_MAX_WORDS}-word product description for: ${productName}`;
}
