import type { MessageContent } from '@langchain/core/messages';

export function contentToText(content: MessageContent): string {
  if (typeof content === 'string') return content;
  return content.map((part) => ('text' in part && typeof part.text === 'string' ? part.text : '')).join('');
}

// Models like to wrap short copy in quotes and break it over lines
export function normalizeGeneratedText(raw: string): string {
  return raw
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^["“”]+|["“”]+$/g, '')
    .trim();
}

export function limitWords(text: string, maxWords: number): string {
  const words = text.split(' ').filter(Boolean);
  if (words.length <= maxWords) return words.join(' ');
  return words.slice(0, maxWords).join(' ');
}
