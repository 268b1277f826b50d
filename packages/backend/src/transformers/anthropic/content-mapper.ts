import { logger } from '../../utils/logger';
import type { ChatContentPart } from '../../types/chat';
import type { ImageBlock, TextBlock } from '../../types/messages';

const DATA_URI_PATTERN = /^data:([^;,]+);base64,(.+)$/s;

/**
 * Builds an image block from a chat image URL. Base64 data URIs become inline
 * sources; anything else is referenced by URL.
 */
export function convertImageUrl(url: string): ImageBlock {
  const match = url.match(DATA_URI_PATTERN);
  const mediaType = match?.[1];
  const data = match?.[2];
  if (mediaType && data) {
    return {
      type: 'image',
      source: { type: 'base64', media_type: mediaType, data },
    };
  }
  return { type: 'image', source: { type: 'url', url } };
}

/**
 * Converts chat content parts (text, image_url) into Messages content blocks.
 * Empty text parts and unsupported part types are dropped.
 */
export function convertChatContentParts(parts: ChatContentPart[]): Array<TextBlock | ImageBlock> {
  const blocks: Array<TextBlock | ImageBlock> = [];

  for (const part of parts) {
    if (part.type === 'text') {
      if (!part.text) {
        logger.debug('Skipping empty text block');
        continue;
      }
      blocks.push({ type: 'text', text: part.text });
    } else if (part.type === 'image_url' && part.image_url) {
      blocks.push(convertImageUrl(part.image_url.url));
    } else {
      logger.debug(`Skipping unsupported content part of type: ${part.type}`);
    }
  }

  return blocks;
}

/**
 * Collects the non-empty texts of a content value, one entry per text part.
 */
export function collectTextParts(content: string | ChatContentPart[]): string[] {
  if (typeof content === 'string') return content ? [content] : [];
  const texts: string[] = [];
  for (const part of content) {
    if (part.type === 'text' && part.text) {
      texts.push(part.text);
    }
  }
  return texts;
}
