/**
 * Corpus Store
 *
 * The Hidden Words ship as a plain-text file, one passage per block, blocks
 * separated by a blank line. Passages are read once at startup and never
 * change afterwards.
 */

import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { Passage } from '@/types/chat';
import { logger } from '@/utils/logger';

const BLOCK_SEPARATOR = /\r?\n[ \t]*\r?\n/;

export function passageId(ordinal: number): string {
  return `verse-${ordinal}`;
}

/**
 * Splits raw corpus text into passages. Block edges are trimmed, inner
 * wording is kept exactly; empty blocks are skipped and do not take an id.
 */
export function parseCorpus(raw: string): Passage[] {
  const passages: Passage[] = [];

  for (const block of raw.split(BLOCK_SEPARATOR)) {
    const text = block.trim();
    if (!text) continue;
    passages.push(Object.freeze({ id: passageId(passages.length + 1), text }));
  }

  return passages;
}

/**
 * Reads the corpus file. Relative paths resolve against the working directory.
 */
export async function loadCorpus(path: string): Promise<Passage[]> {
  const absolutePath = resolve(path);
  const raw = await readFile(absolutePath, 'utf8');
  const passages = parseCorpus(raw);

  if (passages.length === 0) {
    logger.warn('Corpus is empty; replies will carry no passages', { path: absolutePath });
  } else {
    logger.info('Corpus loaded', { path: absolutePath, passages: passages.length });
  }

  return passages;
}
