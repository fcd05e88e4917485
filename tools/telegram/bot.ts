import axios from 'axios';
import * as fs from 'fs';
import * as path from 'path';
import { logger } from '../../src/utils/logger.js';

const TELEGRAM_API = 'https://api.telegram.org';

/**
 * Telegram MarkdownV2 Formatting Reference:
 *
 * *bold*                    → bold text
 * _italic_                  → italic text
 * `code`                    → inline code
 * ```lang\ncode```          → code block
 *
 * Characters that MUST be escaped with \: _ * [ ] ( ) ~ ` > # + - = | { } . !
 *
 * Use escapeMarkdown() for dynamic text, raw MarkdownV2 syntax for formatting.
 */

// Characters that must be escaped in MarkdownV2
const MARKDOWN_V2_SPECIAL_CHARS = /[_*[\]()~`>#+\-=|{}.!]/g;

export function escapeMarkdown(text: string): string {
  return text.replace(MARKDOWN_V2_SPECIAL_CHARS, '\\$&');
}

/**
 * Format helpers for common patterns
 */
export const fmt = {
  bold: (text: string) => `*${escapeMarkdown(text)}*`,
  italic: (text: string) => `_${escapeMarkdown(text)}_`,
};

export interface TelegramTarget {
  token: string;
  chatId: string;
}

/**
 * Chat id from config, falling back to the file the bot writes after the
 * first message it receives.
 */
export function resolveChatId(configured: string | undefined, chatIdFile: string): string | null {
  if (configured) return configured;
  try {
    return fs.readFileSync(chatIdFile, 'utf-8').trim() || null;
  } catch {
    return null;
  }
}

function describeAxiosError(error: unknown): string {
  if (axios.isAxiosError(error)) {
    const data: unknown = error.response?.data;
    if (data && typeof data === 'object' && 'description' in data && typeof data.description === 'string') {
      return data.description;
    }
    return error.message;
  }
  return error instanceof Error ? error.message : String(error);
}

export interface SendMessageOptions {
  parseMode?: 'MarkdownV2' | 'Markdown' | 'HTML' | null;
  disableWebPagePreview?: boolean;
}

interface TelegramResponse {
  result?: { message_id?: number };
}

export async function sendMessage(
  text: string,
  target: TelegramTarget,
  options: SendMessageOptions = {}
): Promise<number | null> {
  const { parseMode = 'MarkdownV2', disableWebPagePreview = true } = options;
  const url = `${TELEGRAM_API}/bot${target.token}/sendMessage`;

  try {
    const response = await axios.post<TelegramResponse>(url, {
      chat_id: target.chatId,
      text,
      ...(parseMode && { parse_mode: parseMode }),
      ...(disableWebPagePreview && { disable_web_page_preview: true }),
    });
    return response.data.result?.message_id ?? null;
  } catch (error) {
    // If MarkdownV2 parsing failed, try without parse_mode as fallback
    if (parseMode && describeAxiosError(error).includes("can't parse")) {
      logger.warn('Telegram', 'MarkdownV2 parse failed, retrying without formatting');
      try {
        const response = await axios.post<TelegramResponse>(url, { chat_id: target.chatId, text });
        return response.data.result?.message_id ?? null;
      } catch (retryError) {
        logger.error('Telegram', `Failed to send message (retry): ${describeAxiosError(retryError)}`);
        return null;
      }
    }
    logger.error('Telegram', `Failed to send message: ${describeAxiosError(error)}`);
    return null;
  }
}

export async function sendDocument(
  filePath: string,
  target: TelegramTarget,
  caption?: string
): Promise<number | null> {
  try {
    const form = new FormData();
    form.append('chat_id', target.chatId);
    if (caption) form.append('caption', caption);
    form.append('document', await fs.openAsBlob(filePath), path.basename(filePath));

    const response = await axios.post<TelegramResponse>(`${TELEGRAM_API}/bot${target.token}/sendDocument`, form);
    return response.data.result?.message_id ?? null;
  } catch (error) {
    logger.error('Telegram', `Failed to send ${path.basename(filePath)}: ${describeAxiosError(error)}`);
    return null;
  }
}
