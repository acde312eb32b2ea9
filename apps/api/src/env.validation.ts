export function validateRequiredEnv(env: NodeJS.ProcessEnv = process.env) {
  const missing: string[] = [];

  // Database
  for (const k of ['DB_HOST', 'DB_PORT', 'DB_USERNAME', 'DB_PASSWORD', 'DB_DATABASE']) {
    if (!env[k]) missing.push(k);
  }
  // Embeddings always go through OpenAI; completions may use Groq instead
  if (!env.OPENAI_API_KEY) missing.push('OPENAI_API_KEY');
  if ((env.LLM_PROVIDER || '').toLowerCase() === 'groq' && !env.GROQ_API_KEY) missing.push('GROQ_API_KEY');

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables: ${missing.join(', ')}`);
  }

  const dims = env.EMBEDDING_DIMENSIONS;
  if (dims !== undefined && !/^[1-9]\d*$/.test(dims.trim())) {
    throw new Error(`EMBEDDING_DIMENSIONS must be a positive integer, got "${dims}"`);
  }
}
