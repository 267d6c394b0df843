export interface ConceptRecord {
  identifier: string;
  title: string;
  body: string;
}

export interface MatchSubject {
  group: string;
  title: string;
  body: string;
  metadata?: string;
}

export interface GroupedRecord extends ConceptRecord, MatchSubject {}

export interface ScoredMatch<T> {
  subject: T;
  score: number;
}

export interface DuplicatePair<T> {
  first: T;
  second: T;
  score: number;
}

export interface DuplicateTitle {
  title: string;
  groups: string[];
}

export type FrontmatterData = Record<string, unknown>;

export type BatchLocation = "generated" | "developing" | "favorites";

export const BATCH_LOCATIONS: readonly BatchLocation[] = [
  "generated",
  "developing",
  "favorites",
];

export interface BatchDocument {
  batchId: string;
  dateGenerated: string | null;
  genre: string | string[] | null;
  tropes: string | string[] | null;
  count: number;
  status: string | null;
  llmModel: string | null;
  promptUsed: string | null;
  notes: string | null;
  location: BatchLocation;
  filePath: string;
  content: string;
  concepts: ConceptRecord[];
  frontmatter: FrontmatterData;
}

export interface StoryDocument {
  name: string;
  storyId: string | null;
  title: string | null;
  genre: string | string[] | null;
  subgenre: string | null;
  tropes: string | string[] | null;
  status: string | null;
  originBatch: string | null;
  dateCreated: string | null;
  dateUpdated: string | null;
  targetLength: string | null;
  filePath: string;
  content: string;
  frontmatter: FrontmatterData;
}
