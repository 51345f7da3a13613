import { z } from 'zod';
import { moduleLogger } from '../logger.js';
import type { Topic } from '../types.js';
import { readJsonFile, resolveDataFile } from '../utils/dataFiles.js';

const log = moduleLogger('keywords');

const KeywordDictionaryFileSchema = z.object({
  topics: z.record(z.array(z.string())),
  companies: z.record(z.array(z.string())).default({}),
});

const StopwordFileSchema = z.object({
  stopwords: z.array(z.string()),
});

/**
 * Static keyword tables, loaded once at startup and shared read-only by
 * every run.
 */
export interface KeywordDictionary {
  readonly topics: ReadonlyMap<string, readonly string[]>;
  readonly companies: ReadonlyMap<string, readonly string[]>;
}

const SIMILAR_TOPIC_THRESHOLD = 0.5;
const SIMILAR_TOPIC_KEYWORDS = 8;

function freezeTable(table: Record<string, string[]>): ReadonlyMap<string, readonly string[]> {
  return new Map(
    Object.entries(table).map(([key, words]): [string, readonly string[]] => [key, Object.freeze([...words])]),
  );
}

export function createKeywordDictionary(
  topics: Record<string, string[]>,
  companies: Record<string, string[]> = {},
): KeywordDictionary {
  return Object.freeze({ topics: freezeTable(topics), companies: freezeTable(companies) });
}

export function loadKeywordDictionary(path: string = resolveDataFile('topic-keywords.json')): KeywordDictionary {
  const file = readJsonFile(path, KeywordDictionaryFileSchema);
  const dictionary = createKeywordDictionary(file.topics, file.companies);
  log.info(
    { path, topics: dictionary.topics.size, companies: dictionary.companies.size },
    'Keyword dictionary loaded',
  );
  return dictionary;
}

export function loadStopwords(path: string = resolveDataFile('stopwords.json')): ReadonlySet<string> {
  const file = readJsonFile(path, StopwordFileSchema);
  return new Set(file.stopwords.map((word) => word.toLowerCase()));
}

/**
 * Word-level Jaccard similarity of two topic names.
 */
export function topicNameSimilarity(a: string, b: string): number {
  const wordsA = new Set(a.split(/\s+/).filter(Boolean));
  const wordsB = new Set(b.split(/\s+/).filter(Boolean));
  if (!wordsA.size || !wordsB.size) return 0;
  let shared = 0;
  for (const word of wordsA) if (wordsB.has(word)) shared++;
  return shared / (wordsA.size + wordsB.size - shared);
}

/**
 * Words of a topic name stripped of punctuation, e.g. "기후변화 대응" -> ["기후변화", "대응"].
 */
export function topicNameKeywords(topicName: string): string[] {
  return topicName
    .split(/\s+/)
    .map((word) => word.replace(/[^\p{L}\p{N}_]/gu, ''))
    .filter((word) => word.length > 1);
}

/**
 * Keyword set searched for a topic: its dictionary entry, the leading keywords
 * of dictionary topics with a similar name, the words of the topic name and
 * the company's own keywords. Deduplicated, at least two characters each.
 */
export function keywordsForTopic(
  topic: Pick<Topic, 'name'>,
  dictionary: KeywordDictionary,
  companyName?: string,
): string[] {
  const keywords: string[] = [];

  const own = dictionary.topics.get(topic.name);
  if (own) keywords.push(...own);

  if (companyName) {
    const company = dictionary.companies.get(companyName);
    if (company) keywords.push(...company);
  }

  for (const [name, words] of dictionary.topics) {
    if (name === topic.name) continue;
    const score = topicNameSimilarity(topic.name, name);
    if (score > SIMILAR_TOPIC_THRESHOLD) {
      keywords.push(...words.slice(0, SIMILAR_TOPIC_KEYWORDS));
      log.debug({ topic: topic.name, similarTo: name, score }, 'Borrowed keywords from similar topic');
    }
  }

  keywords.push(...topicNameKeywords(topic.name));

  const seen = new Set<string>();
  const result: string[] = [];
  for (const keyword of keywords) {
    const cleaned = keyword.trim();
    const key = cleaned.toLowerCase();
    if (cleaned.length > 1 && !seen.has(key)) {
      seen.add(key);
      result.push(cleaned);
    }
  }
  return result;
}
