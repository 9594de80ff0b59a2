/**
 * Shared conversation types.
 */

export type MessageRole = 'user' | 'assistant' | 'system';

export interface TextBlock {
  type: 'text';
  text: string;
}

/**
 * Image payload. Images are sent to the model as base64 and are never
 * tokenized locally; the budget manager charges a flat estimate per block.
 */
export interface ImageBlock {
  type: 'image';
  mediaType: string;
  data: string;
}

export type ContentBlock = TextBlock | ImageBlock;

export interface ConversationMessage {
  role: MessageRole;
  content: string | ContentBlock[];
}

/**
 * Flatten message content to plain text (image blocks are dropped).
 */
export function contentToText(content: ConversationMessage['content']): string {
  if (typeof content === 'string') {
    return content;
  }
  return content
    .filter((block): block is TextBlock => block.type === 'text')
    .map((block) => block.text)
    .join('\n');
}
