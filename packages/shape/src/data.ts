// packages/shape/src/data.ts
// Packaged word lists. Read once, validated, cached.
import fs from 'node:fs';
import { z } from 'zod';
import { foldText } from '@rowsmith/core';

const AliasFileSchema = z.object({
  version: z.literal(1),
  groups: z.array(z.array(z.string().min(1)).min(2))
});

const DiscoveryWordsSchema = z.object({
  version: z.literal(1),
  collectionNames: z.array(z.string().min(1)),
  stopWords: z.array(z.string().min(1))
});

export interface DiscoveryWords {
  collectionNames: ReadonlySet<string>;
  stopWords: ReadonlySet<string>;
}

// folded word -> every folded word sharing a group with it (itself included)
export type AliasIndex = ReadonlyMap<string, ReadonlySet<string>>;

let aliasCache: AliasIndex | undefined;
let wordsCache: DiscoveryWords | undefined;

function readData<T>(file: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const url = new URL(`../data/${file}`, import.meta.url);
  const raw: unknown = JSON.parse(fs.readFileSync(url, 'utf-8'));
  return schema.parse(raw);
}

export function aliasIndex(): AliasIndex {
  if (aliasCache) return aliasCache;
  const { groups } = readData('field-aliases.json', AliasFileSchema);
  const index = new Map<string, Set<string>>();
  for (const group of groups) {
    const folded = group.map(foldText);
    for (const w of folded) {
      const set = index.get(w) ?? new Set<string>();
      folded.forEach(x => set.add(x));
      index.set(w, set);
    }
  }
  aliasCache = index;
  return index;
}

export function discoveryWords(): DiscoveryWords {
  if (wordsCache) return wordsCache;
  const raw = readData('discovery-words.json', DiscoveryWordsSchema);
  wordsCache = {
    collectionNames: new Set(raw.collectionNames.map(foldText)),
    stopWords: new Set(raw.stopWords.map(foldText))
  };
  return wordsCache;
}

