// all-MiniLM-L6-v2 width; text-embedding-3 models can be asked for it directly
export const DEFAULT_EMBEDDING_DIMENSIONS = 384;
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

export const DESCRIPTION_MAX_WORDS = 10;

export const EXPLAIN_MAX_TOKENS = 100;
export const EXPLAIN_TEMPERATURE = 0.5;
export const DESCRIBE_MAX_TOKENS = 50;
export const DESCRIBE_TEMPERATURE = 0.7;
