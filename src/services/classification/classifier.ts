/**
 * Content Classifier
 *
 * Turns raw text plus declared metadata into a ContentProfile. Pure and
 * deterministic: every score is computed from a fixed leading sample of the
 * text and rounded to 4 decimals, so identical input gives bit-identical
 * output. No I/O beyond the one-time lexicon load.
 *
 * @module services/classification/classifier
 */

import { readFileSync } from 'fs';
import { z } from 'zod';
import type { ContentProfile } from '../../models/content-record.js';
import { clamp, coefficientOfVariation, mean, roundTo } from '../../utils/math.js';
import { tokenize } from '../../utils/text.js';
import { ValidationError, validateInput } from '../../utils/validation.js';

/** Characters of text the profile is computed from */
export const SAMPLE_LENGTH = 20_000;

/** Characters scanned by detectDomain */
export const DOMAIN_SAMPLE_LENGTH = 1_000;

const TTR_TOKEN_LIMIT = 1_000;
const COHERENCE_WINDOW = 50;
const COHERENCE_SCALE = 2.5;
const STRUCTURE_SATURATION = 5;
const MIN_INFORMATIVE_LENGTH = 3;

export const GENERAL_DOMAIN = 'general';

// ═══════════════════════════════════════════════════════════════════════════════
// LEXICON
// ═══════════════════════════════════════════════════════════════════════════════

const LexiconSchema = z.object({
  domainKeywords: z.record(z.array(z.string().min(1))),
  domainPriors: z.record(z.number().min(0).max(1)),
  contentTypePriors: z.record(z.number().min(0).max(1)),
  defaultPrior: z.number().min(0).max(1),
  stopWords: z.array(z.string()),
});

export type Lexicon = z.infer<typeof LexiconSchema>;

interface LoadedLexicon extends Lexicon {
  stopWordSet: Set<string>;
  // Maps, so a name such as 'constructor' never resolves through Object.prototype
  domainPriorMap: Map<string, number>;
  contentTypePriorMap: Map<string, number>;
}

let lexicon: LoadedLexicon | null = null;

function getLexicon(): LoadedLexicon {
  if (!lexicon) {
    const raw = readFileSync(new URL('./data/lexicon.json', import.meta.url), 'utf-8');
    const parsed = LexiconSchema.parse(JSON.parse(raw));
    lexicon = {
      ...parsed,
      stopWordSet: new Set(parsed.stopWords),
      domainPriorMap: new Map(Object.entries(parsed.domainPriors)),
      contentTypePriorMap: new Map(Object.entries(parsed.contentTypePriors)),
    };
  }
  return lexicon;
}

/**
 * Query-potential prior for a domain (defaultPrior when unknown)
 */
export function domainPrior(domain: string): number {
  const lex = getLexicon();
  return lex.domainPriorMap.get(domain) ?? lex.defaultPrior;
}

/**
 * Query-potential prior for a content type (defaultPrior when unknown)
 */
export function contentTypePrior(contentType: string): number {
  const lex = getLexicon();
  return lex.contentTypePriorMap.get(contentType) ?? lex.defaultPrior;
}

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT
// ═══════════════════════════════════════════════════════════════════════════════

const ClassifierInputSchema = z.object({
  text: z.string(),
  domain: z.string().min(1),
  contentType: z.string().min(1),
  declaredSize: z.number().finite().nonnegative(),
});

export type ClassifierInput = z.infer<typeof ClassifierInputSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// SCORES
// ═══════════════════════════════════════════════════════════════════════════════

function isInformative(token: string, stopWords: Set<string>): boolean {
  return token.length >= MIN_INFORMATIVE_LENGTH && !stopWords.has(token);
}

/**
 * 0.6 x type-token ratio of the first 1000 tokens
 * + 0.4 x min(1, coefficient of variation of sentence lengths)
 */
export function semanticComplexity(sample: string, tokens: string[]): number {
  const head = tokens.slice(0, TTR_TOKEN_LIMIT);
  const ttr = head.length === 0 ? 0 : new Set(head).size / head.length;

  const sentenceLengths = sample
    .split(/[.!?]+(?:\s+|$)/)
    .map((s) => tokenize(s).length)
    .filter((n) => n > 0);
  const variation = Math.min(1, coefficientOfVariation(sentenceLengths));

  return 0.6 * ttr + 0.4 * variation;
}

/**
 * Mean Jaccard overlap of informative tokens between adjacent 50-token
 * windows, scaled x2.5 and clamped. 0.3 below two windows.
 */
export function topicCoherence(tokens: string[], stopWords: Set<string>): number {
  const windows: Set<string>[] = [];
  for (let i = 0; i < tokens.length; i += COHERENCE_WINDOW) {
    windows.push(
      new Set(tokens.slice(i, i + COHERENCE_WINDOW).filter((t) => isInformative(t, stopWords)))
    );
  }
  if (windows.length < 2) return 0.3;

  const overlaps: number[] = [];
  for (let i = 1; i < windows.length; i++) {
    const a = windows[i - 1];
    const b = windows[i];
    let intersection = 0;
    for (const t of a) {
      if (b.has(t)) intersection++;
    }
    const union = a.size + b.size - intersection;
    overlaps.push(union === 0 ? 0 : intersection / union);
  }
  return clamp(mean(overlaps) * COHERENCE_SCALE, 0, 1);
}

/**
 * Distinct informative tokens / total tokens
 */
export function informationDensity(tokens: string[], stopWords: Set<string>): number {
  if (tokens.length === 0) return 0;
  const distinct = new Set(tokens.filter((t) => isInformative(t, stopWords)));
  return distinct.size / tokens.length;
}

/**
 * Structural markers: markdown headings, chapter/section words, numbered
 * section lines and reference markers (http, doi, isbn). Saturates at 5.
 */
export function structureScore(sample: string): number {
  const count = (pattern: RegExp): number => sample.match(pattern)?.length ?? 0;
  const markers =
    count(/^#{1,6}\s+\S/gm) +
    count(/\b(?:chapter|section)\b/gi) +
    count(/^\s*\d+(?:\.\d+)*[.)]?\s+[A-Z]/gm) +
    count(/\b(?:https?:\/\/|doi|isbn)/gi);
  return Math.min(1, markers / STRUCTURE_SATURATION);
}

/**
 * 0.4 x domain prior + 0.3 x structure + 0.3 x content-type prior
 */
export function queryPotential(structure: number, domain: string, contentType: string): number {
  return 0.4 * domainPrior(domain) + 0.3 * structure + 0.3 * contentTypePrior(contentType);
}

function finalize(profile: ContentProfile): ContentProfile {
  return {
    semantic_complexity: roundTo(clamp(profile.semantic_complexity, 0, 1)),
    topic_coherence: roundTo(clamp(profile.topic_coherence, 0, 1)),
    information_density: roundTo(clamp(profile.information_density, 0, 1)),
    query_potential: roundTo(clamp(profile.query_potential, 0, 1)),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Compute the content profile.
 *
 * @throws ValidationError on malformed input
 */
export function classifyContent(input: ClassifierInput): ContentProfile {
  const { text, domain, contentType } = validateInput(ClassifierInputSchema, input);
  const { stopWordSet } = getLexicon();

  const sample = text.slice(0, SAMPLE_LENGTH);
  if (sample.trim().length === 0) {
    return finalize({
      semantic_complexity: 0.5,
      topic_coherence: 0.3,
      information_density: 0.3,
      query_potential: queryPotential(0, domain, contentType),
    });
  }

  const tokens = tokenize(sample);
  return finalize({
    semantic_complexity: semanticComplexity(sample, tokens),
    topic_coherence: topicCoherence(tokens, stopWordSet),
    information_density: informationDensity(tokens, stopWordSet),
    query_potential: queryPotential(structureScore(sample), domain, contentType),
  });
}

/**
 * Keyword-table domain detection over the leading text and the locator.
 * Each domain scores one point per keyword found; the highest score wins,
 * earlier table entries win ties, and no hits at all yields 'general'.
 */
export function detectDomain(text: string, locator: string): string {
  const content = text.slice(0, DOMAIN_SAMPLE_LENGTH).toLowerCase();
  const url = locator.toLowerCase();

  let best = GENERAL_DOMAIN;
  let bestScore = 0;
  for (const [domain, keywords] of Object.entries(getLexicon().domainKeywords)) {
    const score = keywords.filter((k) => content.includes(k) || url.includes(k)).length;
    if (score > bestScore) {
      best = domain;
      bestScore = score;
    }
  }
  return best;
}

/**
 * Content type from locator indicators, else from size
 */
export function inferContentType(locator: string, size: number): string {
  if (!Number.isFinite(size) || size < 0) {
    throw new ValidationError(`size must be a non-negative number, got ${size}`);
  }
  const url = locator.toLowerCase();
  if (['book', 'ebook', 'gutenberg'].some((i) => url.includes(i))) return 'book';
  if (['paper', 'journal', 'arxiv'].some((i) => url.includes(i))) return 'academic_paper';
  if (['wiki', 'encyclopedia'].some((i) => url.includes(i))) return 'reference';

  if (size > 10_000_000) return 'book';
  if (size > 1_000_000) return 'large_document';
  if (size > 100_000) return 'medium_document';
  return 'small_document';
}
