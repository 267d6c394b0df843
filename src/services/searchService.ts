import type { IdeaRepository } from "../domain/ideaRepository.js";
import type { BatchDocument, MatchSubject, StoryDocument } from "../domain/types.js";
import { formatList } from "../infra/parsers/documentLoader.js";
import {
  DEFAULT_FUZZY_THRESHOLD,
  searchableText,
  searchExact,
  searchFuzzy,
} from "../pipelines/matchEngine.js";
import { createLogger } from "../utils/logger.js";
import { sanitizeSearchQuery, validateLimit, validateString } from "../utils/validation.js";

const logger = createLogger("search");

const PREVIEW_CONTEXT_CHARS = 100;
const FUZZY_PREVIEW_CHARS = 200;

export interface SearchRequest {
  query: string;
  genre?: string;
  trope?: string;
  status?: string;
  fuzzy?: boolean;
  limit?: number;
}

export interface SearchHit {
  type: "concept" | "story";
  title: string;
  batchId?: string;
  genre: string | string[] | null;
  file: string;
  score?: number;
  preview: string;
}

interface SearchSubject extends MatchSubject {
  type: "concept" | "story";
  batchId?: string;
  genre: string | string[] | null;
  tropes: string | string[] | null;
  status: string | null;
  file: string;
}

export class SearchService {
  constructor(
    private readonly repository: IdeaRepository,
    private readonly fuzzyThreshold = DEFAULT_FUZZY_THRESHOLD,
  ) {}

  async search(request: SearchRequest): Promise<SearchHit[]> {
    const query = sanitizeSearchQuery(request.query);
    const limit = validateLimit(request.limit ?? 20);
    const genre = optionalFilter(request.genre, "genre", 100);
    const trope = optionalFilter(request.trope, "trope", 100);
    const status = optionalFilter(request.status, "status", 50);
    const fuzzy = request.fuzzy ?? false;

    logger.info(
      `Searching: query='${query}', fuzzy=${fuzzy}, limit=${limit}, genre=${genre ?? "-"}, trope=${trope ?? "-"}, status=${status ?? "-"}`,
    );

    const subjects = [
      ...(await this.repository.listBatches()).flatMap(conceptSubjects),
      ...(await this.repository.listStories()).map(storySubject),
    ];
    const predicate = (subject: SearchSubject) =>
      containsIgnoreCase(subject.genre, genre) &&
      containsIgnoreCase(subject.tropes, trope) &&
      (!status || subject.status === status);

    const hits: SearchHit[] = fuzzy
      ? searchFuzzy(subjects, query, { threshold: this.fuzzyThreshold, predicate }).map(
          ({ subject, score }) => ({
            ...toHit(subject),
            score,
            preview: searchableText(subject).slice(0, FUZZY_PREVIEW_CHARS),
          }),
        )
      : searchExact(subjects, query, predicate).map((subject) => ({
          ...toHit(subject),
          preview: buildPreview(searchableText(subject), query),
        }));

    const limited = hits.slice(0, limit);
    logger.info(`Search completed: found ${hits.length} results, returning ${limited.length}`);
    return limited;
  }
}

/**
 * Text around the first case-insensitive match, with `...` marking each
 * trimmed side.
 */
export function buildPreview(
  text: string,
  query: string,
  contextChars = PREVIEW_CONTEXT_CHARS,
): string {
  const at = text.toLowerCase().indexOf(query.toLowerCase());
  if (at < 0) {
    return text.slice(0, FUZZY_PREVIEW_CHARS);
  }

  const start = Math.max(0, at - contextChars);
  const end = Math.min(text.length, at + query.length + contextChars);
  const prefix = start > 0 ? "..." : "";
  const suffix = end < text.length ? "..." : "";
  return `${prefix}${text.slice(start, end)}${suffix}`;
}

function conceptSubjects(batch: BatchDocument): SearchSubject[] {
  return batch.concepts.map((concept) => ({
    type: "concept",
    group: batch.batchId,
    title: concept.title,
    body: concept.body,
    batchId: batch.batchId,
    genre: batch.genre,
    tropes: batch.tropes,
    status: batch.status,
    file: batch.filePath,
  }));
}

function storySubject(story: StoryDocument): SearchSubject {
  return {
    type: "story",
    group: `story:${story.name}`,
    title: story.title ?? "",
    body: story.content,
    genre: story.genre,
    tropes: story.tropes,
    status: story.status,
    file: story.filePath,
  };
}

function toHit(subject: SearchSubject): Omit<SearchHit, "preview"> {
  const hit: Omit<SearchHit, "preview"> = {
    type: subject.type,
    title: subject.title || "Untitled",
    genre: subject.genre,
    file: subject.file,
  };
  if (subject.batchId) {
    hit.batchId = subject.batchId;
  }
  return hit;
}

function optionalFilter(value: string | undefined, fieldName: string, maxLength: number) {
  return value ? validateString(value, fieldName, { maxLength }) : undefined;
}

function containsIgnoreCase(value: string | string[] | null, wanted: string | undefined): boolean {
  return !wanted || formatList(value).toLowerCase().includes(wanted.toLowerCase());
}
