import {PollDescriptor} from '../types/quiz';
import {logger} from '../utils/logger';
import {PollImportError} from './errors';

export interface TelegramPostRef {
  channel: string;
  messageId: number;
}

/** The parts of a Telegram poll object the importer reads. */
export interface ForwardedPoll {
  question: string;
  options: Array<{text: string}>;
  type: string;
  correct_option_id?: number;
  explanation?: string;
}

export type FetchLike = (url: string, init?: {signal?: AbortSignal; headers?: Record<string, string>}) => Promise<{
  ok: boolean;
  status: number;
  text(): Promise<string>;
}>;

const POST_URL_PATTERN = /^(?:https?:\/\/)?(?:www\.)?(?:t|telegram)\.me\/(?:s\/)?([A-Za-z0-9_]{4,})\/(\d+)(?:[/?#].*)?$/i;
const POLL_QUESTION_PATTERN = /<div class="tgme_widget_message_poll_question">([^<]+)<\/div>/;
const POLL_OPTION_PATTERN = /<div class="tgme_widget_message_poll_option_text">([^<]+)<\/div>/g;
const MESSAGE_TEXT_PATTERN = /<div class="tgme_widget_message_text[^"]*"[^>]*>([\s\S]*?)<\/div>/;
const OPTION_PREFIX_PATTERN = /^[A-Za-z0-9][.)]\s*/;

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

export function parseTelegramPostUrl(url: string): TelegramPostRef | null {
  const match = url.trim().match(POST_URL_PATTERN);
  if (!match) {
    return null;
  }
  return {channel: match[1], messageId: Number(match[2])};
}

export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity, body: string) => {
    if (body[0] === '#') {
      const code = body[1] === 'x' || body[1] === 'X'
        ? parseInt(body.slice(2), 16)
        : parseInt(body.slice(1), 10);
      return Number.isNaN(code) || code > 0x10ffff ? entity : String.fromCodePoint(code);
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

/**
 * Reads a quiz written as plain text: the first line is the question,
 * every following line an option ("A) ...", "1. ..." markers dropped).
 */
export function extractQuizFromText(text: string, source: string): PollDescriptor | null {
  const lines = text
    .split('\n')
    .map(line => line.trim())
    .filter(line => line.length > 0);

  if (lines.length < 3) {
    return null;
  }

  const options = lines
    .slice(1)
    .map(line => line.replace(OPTION_PREFIX_PATTERN, '').trim())
    .filter(line => line.length > 0);

  if (options.length < 2) {
    return null;
  }
  return {question: lines[0], options, source};
}

export function extractPollFromHtml(html: string, source: string): PollDescriptor | null {
  const questionMatch = html.match(POLL_QUESTION_PATTERN);
  const options = [...html.matchAll(POLL_OPTION_PATTERN)].map(m => decodeHtmlEntities(m[1]).trim());

  if (questionMatch && options.length >= 2) {
    return {question: decodeHtmlEntities(questionMatch[1]).trim(), options, source};
  }

  const textMatch = html.match(MESSAGE_TEXT_PATTERN);
  if (textMatch) {
    const plain = decodeHtmlEntities(
      textMatch[1].replace(/<br\s*\/?>/gi, '\n').replace(/<[^>]+>/g, '')
    );
    const fromText = extractQuizFromText(plain, source);
    if (fromText) {
      return fromText;
    }
  }

  const title = readMetaContent(html, 'og:title');
  const description = readMetaContent(html, 'og:description');
  if (title && description && title.toLowerCase().includes('quiz')) {
    const metaOptions = description
      .split(',')
      .map(o => o.trim())
      .filter(o => o.length > 0);
    if (metaOptions.length >= 2) {
      return {question: title, options: metaOptions, source};
    }
  }

  return null;
}

export function descriptorFromPoll(poll: ForwardedPoll, source = 'forwarded poll'): PollDescriptor {
  const descriptor: PollDescriptor = {
    question: poll.question,
    options: poll.options.map(o => o.text),
    source,
  };
  if (poll.type === 'quiz' && poll.correct_option_id !== undefined) {
    descriptor.correctIndex = poll.correct_option_id;
  }
  if (poll.explanation) {
    descriptor.explanation = poll.explanation;
  }
  return descriptor;
}

function readMetaContent(html: string, property: string): string | null {
  const pattern = new RegExp(`<meta property="${property}" content="([^"]*)"`, 'i');
  const match = html.match(pattern);
  return match ? decodeHtmlEntities(match[1]).trim() : null;
}

/**
 * Fetches public Telegram posts and turns them into clone sources.
 */
export class PollImportService {
  constructor(
    private readonly fetchImpl: FetchLike = fetch,
    private readonly timeoutMs = 10_000
  ) {}

  async fetchFromUrl(url: string): Promise<PollDescriptor> {
    const ref = parseTelegramPostUrl(url);
    if (!ref) {
      throw new PollImportError('That does not look like a Telegram post link (https://t.me/<channel>/<id>)');
    }

    const embedUrl = `https://t.me/${ref.channel}/${ref.messageId}?embed=1`;
    const html = await this.fetchText(embedUrl);
    const descriptor = extractPollFromHtml(html, url.trim());

    if (!descriptor) {
      logger.warn(`No quiz found at ${embedUrl}`);
      throw new PollImportError('Could not find a quiz in that post');
    }

    logger.info(`Imported "${descriptor.question}" from ${embedUrl}`);
    return descriptor;
  }

  private async fetchText(url: string): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        signal: controller.signal,
        headers: {'Accept': 'text/html'},
      });

      if (!response.ok) {
        throw new PollImportError(`The post could not be loaded (HTTP ${response.status})`);
      }
      return await response.text();
    } catch (error) {
      if (error instanceof PollImportError) {
        throw error;
      }
      logger.error(`Fetching ${url} failed`, error);
      throw new PollImportError('The post could not be loaded', error);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
