// packages/shape/src/discovery.ts
// Record path discovery: find the array inside an arbitrary document that
// most plausibly holds "the records".
import type { JsonObject, JsonValue, RecordPathCandidate, TransformFailure } from '@rowsmith/core';
import { Errors, foldText, formatPointer, isJsonObject, jsonKind, parsePointer } from '@rowsmith/core';
import { discoveryWords } from './data.js';

export interface DiscoveryOptions {
  maxDepth?: number;
}

export type DiscoveryResult =
  | { success: true; recordPath: string; score: number; candidates: RecordPathCandidate[] }
  | { success: false; candidates: RecordPathCandidate[]; error: TransformFailure };

export const DEFAULT_MAX_DEPTH = 5;
const ITEM_PROBE = 20; // items inspected per array for kind / field count

// ---------- goal words ----------
export function goalWords(goalText?: string): string[] {
  if (!goalText) return [];
  const { stopWords } = discoveryWords();
  const out: string[] = [];
  for (const w of foldText(goalText).split(/[^\p{L}\p{N}]+/u)) {
    if (w.length < 3 || stopWords.has(w) || out.includes(w)) continue;
    out.push(w);
  }
  return out;
}

// ---------- scoring ----------
export function scoreCandidate(c: RecordPathCandidate, words: readonly string[]): number {
  let score = 10;
  score += Math.min(c.arrayLength, 20);
  if (c.arrayLength >= 3) score += 10;
  if (c.hasObjectItems) score += 50 + Math.min(c.objectFieldCount, 10) / 2;
  else if (c.arrayLength > 0) score -= 40;

  const segs = parsePointer(c.path).map(foldText);
  const name = segs.at(-1);
  if (name !== undefined) {
    if (discoveryWords().collectionNames.has(name)) score += 30;

    if (words.includes(name)) score += 40;
    else if (name.length >= 3 && words.some(w => name.includes(w) || w.includes(name))) score += 15;

    if (segs.slice(0, -1).some(a => words.includes(a))) score += 10;
  }

  score -= 5 * Math.max(0, c.depth - 1);
  return score;
}

function probe(arr: JsonValue[]): { hasObjectItems: boolean; objectFieldCount: number } {
  const keys = new Set<string>();
  let hasObjectItems = false;
  for (const item of arr.slice(0, ITEM_PROBE)) {
    if (!isJsonObject(item)) continue;
    hasObjectItems = true;
    Object.keys(item).forEach(k => keys.add(k));
  }
  return { hasObjectItems, objectFieldCount: keys.size };
}

function candidate(segs: string[], arr: JsonValue[]): RecordPathCandidate {
  return {
    path: formatPointer(segs),
    arrayLength: arr.length,
    depth: segs.length,
    score: 0,
    ...probe(arr)
  };
}

// arrays are leaves: we never descend into them
function walk(obj: JsonObject, segs: string[], maxDepth: number, out: RecordPathCandidate[]) {
  for (const [key, value] of Object.entries(obj)) {
    const here = [...segs, key];
    if (Array.isArray(value)) {
      out.push(candidate(here, value));
    } else if (isJsonObject(value) && here.length < maxDepth) {
      walk(value, here, maxDepth, out);
    }
  }
}

function eligible(c: RecordPathCandidate): boolean {
  return c.depth === 0 || c.hasObjectItems || c.arrayLength === 0;
}

export function rankCandidates(candidates: RecordPathCandidate[]): RecordPathCandidate[] {
  // Array.prototype.sort is stable, so ties keep first-seen order
  return candidates.slice().sort((a, b) => (b.score - a.score) || (a.depth - b.depth));
}

export function discover(document: JsonValue, goalText?: string, options: DiscoveryOptions = {}): DiscoveryResult {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  const words = goalWords(goalText);

  const found: RecordPathCandidate[] = [];
  const kind = jsonKind(document);
  if (Array.isArray(document)) {
    found.push(candidate([], document));
  } else if (isJsonObject(document)) {
    walk(document, [], maxDepth, found);
  } else {
    return { success: false, candidates: [], error: Errors.NO_RECORDSET(`document is ${kind}, not an array or object`) };
  }

  const candidates = rankCandidates(found.map(c => ({ ...c, score: scoreCandidate(c, words) })));
  const winner = candidates.find(eligible);
  if (!winner) {
    const reason = candidates.length === 0
      ? 'no arrays found in document'
      : 'no array of objects found in document';
    return { success: false, candidates, error: Errors.NO_RECORDSET(reason) };
  }
  return { success: true, recordPath: winner.path, score: winner.score, candidates };
}
