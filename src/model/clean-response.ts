const THINKING_BLOCK = /<thinking>[\s\S]*?<\/thinking>/g;

export type ContentPart = { type: string; text?: string };

/**
 * Remove reasoning blocks some models put in their replies
 */
export function cleanResponse(text: string): string {
  return text.replace(THINKING_BLOCK, '').trim();
}

/**
 * Flatten reply content to text; only `text` parts count
 */
export function contentText(content: string | readonly ContentPart[] | null | undefined): string {
  if (content === null || content === undefined) return '';
  if (typeof content === 'string') return content;
  return content
    .filter((part) => part.type === 'text')
    .map((part) => part.text ?? '')
    .join('');
}
