import type {
  DuplicatePair,
  DuplicateTitle,
  MatchSubject,
  ScoredMatch,
} from "../domain/types.js";
import { similarityScore, type SimilarityScorer } from "../utils/similarity.js";

export const DEFAULT_FUZZY_THRESHOLD = 0.6;
export const DEFAULT_DUPLICATE_THRESHOLD = 0.8;

export type SubjectPredicate<T> = (subject: T) => boolean;

export interface FuzzySearchOptions<T> {
  threshold?: number;
  limit?: number;
  predicate?: SubjectPredicate<T>;
  scorer?: SimilarityScorer;
}

export interface NearDuplicateOptions {
  threshold?: number;
  signal?: AbortSignal;
  scorer?: SimilarityScorer;
}

export function searchableText(subject: MatchSubject): string {
  const text = `${subject.title} ${subject.body}`;
  return subject.metadata ? `${text} ${subject.metadata}` : text;
}

export function searchExact<T extends MatchSubject>(
  subjects: readonly T[],
  query: string,
  predicate?: SubjectPredicate<T>,
): T[] {
  const needle = query.toLowerCase();
  return subjects.filter(
    (subject) =>
      (!predicate || predicate(subject)) &&
      searchableText(subject).toLowerCase().includes(needle),
  );
}

/**
 * Scores every subject against the query and keeps those strictly above the
 * threshold, best first. Equal scores keep their input order.
 */
export function searchFuzzy<T extends MatchSubject>(
  subjects: readonly T[],
  query: string,
  options: FuzzySearchOptions<T> = {},
): Array<ScoredMatch<T>> {
  const threshold = options.threshold ?? DEFAULT_FUZZY_THRESHOLD;
  const scorer = options.scorer ?? similarityScore;
  const matches: Array<ScoredMatch<T>> = [];

  for (const subject of subjects) {
    if (options.predicate && !options.predicate(subject)) {
      continue;
    }
    const score = scorer(query, searchableText(subject));
    if (score > threshold) {
      matches.push({ subject, score });
    }
  }

  matches.sort((a, b) => b.score - a.score);
  return options.limit === undefined ? matches : matches.slice(0, Math.max(0, options.limit));
}

/**
 * Pairs subjects from different groups whose similarity reaches the
 * threshold. Pairs are enumerated by index (i < j) and that order is kept for
 * equal scores.
 */
export function findNearDuplicates<T extends MatchSubject>(
  subjects: readonly T[],
  options: NearDuplicateOptions = {},
): Array<DuplicatePair<T>> {
  const threshold = options.threshold ?? DEFAULT_DUPLICATE_THRESHOLD;
  const scorer = options.scorer ?? similarityScore;
  const texts = subjects.map((subject) => searchableText(subject));
  const pairs: Array<DuplicatePair<T>> = [];

  for (let i = 0; i < subjects.length; i += 1) {
    options.signal?.throwIfAborted();
    for (let j = i + 1; j < subjects.length; j += 1) {
      if (subjects[i].group === subjects[j].group) {
        continue;
      }
      const score = scorer(texts[i], texts[j]);
      if (score >= threshold) {
        pairs.push({ first: subjects[i], second: subjects[j], score });
      }
    }
  }

  pairs.sort((a, b) => b.score - a.score);
  return pairs;
}

export function findDuplicateTitles<T extends MatchSubject>(
  subjects: readonly T[],
): DuplicateTitle[] {
  const groupsByTitle = new Map<string, string[]>();

  for (const subject of subjects) {
    const title = subject.title.trim().toLowerCase();
    if (!title) {
      continue;
    }
    const groups = groupsByTitle.get(title) ?? [];
    groups.push(subject.group);
    groupsByTitle.set(title, groups);
  }

  return [...groupsByTitle.entries()]
    .filter(([, groups]) => groups.length > 1)
    .map(([title, groups]) => ({ title, groups }))
    .sort((a, b) => b.groups.length - a.groups.length);
}
