import { z } from 'zod';
import { moduleLogger } from '../logger.js';
import { readJsonFile, resolveDataFile } from '../utils/dataFiles.js';

const log = moduleLogger('standards');

export const UNMAPPED = 'unmapped';

export interface StandardMapper {
  mapTopicToCode(topicName: string): string | undefined;
}

const StandardMapFileSchema = z.object({
  standard: z.string(),
  mappings: z.record(z.string()),
});

/**
 * Mapper over a fixed topic -> standard code table. An exact name wins;
 * otherwise the longest table key contained in the topic name is used.
 */
export class StaticStandardMapper implements StandardMapper {
  private readonly table: ReadonlyMap<string, string>;
  private readonly keysByLength: readonly string[];

  constructor(mappings: Record<string, string>) {
    this.table = new Map(Object.entries(mappings).map(([k, v]): [string, string] => [k.toLowerCase(), v]));
    this.keysByLength = Array.from(this.table.keys()).sort((a, b) => b.length - a.length);
  }

  static fromFile(path: string = resolveDataFile('standard-codes.json')): StaticStandardMapper {
    const file = readJsonFile(path, StandardMapFileSchema);
    log.info({ path, standard: file.standard, entries: Object.keys(file.mappings).length }, 'Standard map loaded');
    return new StaticStandardMapper(file.mappings);
  }

  mapTopicToCode(topicName: string): string | undefined {
    const key = topicName.trim().toLowerCase();
    const exact = this.table.get(key);
    if (exact) return exact;
    const contained = this.keysByLength.find((candidate) => key.includes(candidate));
    return contained ? this.table.get(contained) : undefined;
  }
}

/**
 * Standard alignment for a subject: an explicit code first, then the mapper,
 * then 'unmapped' (logged, never fatal).
 */
export function resolveStandardAlignment(
  subject: string,
  explicitCode: string | undefined,
  mapper: StandardMapper | undefined,
): string {
  if (explicitCode) return explicitCode;
  const mapped = mapper?.mapTopicToCode(subject);
  if (mapped) return mapped;
  log.debug({ subject }, 'No standard code found for subject');
  return UNMAPPED;
}
