/**
 * Extraction Oracle - turns a page's visible text into a title, content
 * and author record.
 */

import { z } from 'zod';
import type { ContentItem } from '../types/index.js';
import { ExtractionError } from '../types/errors.js';
import { MIN_VISIBLE_TEXT_LENGTH, extractVisibleText } from '../utils/content-extractor.js';
import { logger } from '../utils/logger.js';
import { parseJsonReply, type TextCompletion } from './oracle-client.js';

const log = logger.oracle;

/**
 * Characters of visible text sent to the oracle
 */
export const ORACLE_INPUT_LIMIT = 4000;

/**
 * Characters of visible text used as content when the oracle omits it
 */
export const FALLBACK_CONTENT_LIMIT = 2000;

export interface ExtractedRecord {
  title?: string;
  content?: string;
  author?: string;
}

export interface ExtractionOracle {
  extract(visibleText: string, sourceUrl: string): Promise<ExtractedRecord>;
}

// Models sometimes send null for fields they could not find
const optionalText = z.preprocess(
  (val) => (val === null ? undefined : val),
  z.string().optional()
);

const extractedRecordSchema = z.object({
  title: optionalText,
  content: optionalText,
  author: optionalText,
});

const EXTRACTION_SYSTEM_PROMPT = `You are an expert data transformation agent. Your task is to extract the main article from the provided page text and format it into a specific JSON structure.

Return ONLY a valid JSON object with the following schema:
{
  "title": "The main title of the article. Be concise and accurate.",
  "content": "The full article content, formatted as clean Markdown (max 2000 chars). Preserve headings, lists, bold text, and code blocks.",
  "author": "The author's name, or 'Unknown' if not found."
}

Focus exclusively on the main article content. Ignore navigation bars, sidebars, ads, footers, and other boilerplate text.`;

/**
 * Extraction oracle backed by a Claude text completion
 */
export class LlmExtractionOracle implements ExtractionOracle {
  constructor(private readonly complete: TextCompletion) {}

  async extract(visibleText: string, sourceUrl: string): Promise<ExtractedRecord> {
    const reply = await this.complete({
      system: EXTRACTION_SYSTEM_PROMPT,
      prompt: `URL: ${sourceUrl}\n\nContent:\n${visibleText.slice(0, ORACLE_INPUT_LIMIT)}`,
      maxTokens: 1000,
      temperature: 0,
    });

    let parsed: unknown;
    try {
      parsed = parseJsonReply(reply);
    } catch (error) {
      throw new ExtractionError('Oracle reply is not JSON', 'EXTRACTION_MALFORMED_RESPONSE', { url: sourceUrl }, { cause: error });
    }

    const result = extractedRecordSchema.safeParse(parsed);
    if (!result.success) {
      throw new ExtractionError(
        `Oracle reply has the wrong shape: ${result.error.issues.map((i) => i.message).join('; ')}`,
        'EXTRACTION_MALFORMED_RESPONSE',
        { url: sourceUrl }
      );
    }
    return result.data;
  }
}

/**
 * Run the extraction step for one fetched document: visible text, the
 * length gate, the oracle, then defaults for anything it left out.
 * Every failure is an ExtractionError.
 */
export async function extractItems(
  oracle: ExtractionOracle,
  rawContent: string,
  sourceUrl: string
): Promise<ContentItem[]> {
  const text = extractVisibleText(rawContent);
  if (text.length < MIN_VISIBLE_TEXT_LENGTH) {
    throw new ExtractionError(
      `Visible text too short (${text.length} < ${MIN_VISIBLE_TEXT_LENGTH})`,
      'EXTRACTION_CONTENT_TOO_SHORT',
      { url: sourceUrl }
    );
  }

  let record: ExtractedRecord;
  try {
    record = await oracle.extract(text, sourceUrl);
  } catch (error) {
    if (error instanceof ExtractionError) throw error;
    throw new ExtractionError(
      `Extraction oracle failed: ${error instanceof Error ? error.message : String(error)}`,
      'EXTRACTION_ORACLE_FAILED',
      { url: sourceUrl },
      { cause: error }
    );
  }

  log.debug('Extracted record', { url: sourceUrl, title: record.title });
  return [
    {
      title: record.title ?? 'Extracted Content',
      content: record.content ?? text.slice(0, FALLBACK_CONTENT_LIMIT),
      content_type: 'blog',
      source_url: sourceUrl,
      author: record.author ?? 'Unknown',
      user_id: '',
    },
  ];
}
