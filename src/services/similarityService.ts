import type { IdeaRepository } from "../domain/ideaRepository.js";
import type {
  BatchDocument,
  DuplicatePair,
  DuplicateTitle,
  GroupedRecord,
  ScoredMatch,
} from "../domain/types.js";
import {
  DEFAULT_DUPLICATE_THRESHOLD,
  DEFAULT_FUZZY_THRESHOLD,
  findDuplicateTitles,
  findNearDuplicates,
  searchFuzzy,
} from "../pipelines/matchEngine.js";
import { createLogger } from "../utils/logger.js";
import { validateLimit, validateString, validateThreshold } from "../utils/validation.js";

const logger = createLogger("similarity");

export interface SimilarityThresholds {
  fuzzy: number;
  duplicate: number;
}

export class SimilarityService {
  constructor(
    private readonly repository: IdeaRepository,
    private readonly thresholds: SimilarityThresholds = {
      fuzzy: DEFAULT_FUZZY_THRESHOLD,
      duplicate: DEFAULT_DUPLICATE_THRESHOLD,
    },
  ) {}

  /** Near-duplicate concepts across different batches, most similar first. */
  async findSimilarConcepts(
    options: { threshold?: number; signal?: AbortSignal } = {},
  ): Promise<Array<DuplicatePair<GroupedRecord>>> {
    const threshold = validateThreshold(options.threshold ?? this.thresholds.duplicate);
    const records = await this.groupedRecords();

    logger.info(`Comparing ${records.length} concepts at threshold ${threshold}`);
    const pairs = findNearDuplicates(records, { threshold, signal: options.signal });
    logger.info(`Found ${pairs.length} similar concept pairs`);
    return pairs;
  }

  async findSimilarToText(
    text: string,
    options: { limit?: number; threshold?: number } = {},
  ): Promise<Array<ScoredMatch<GroupedRecord>>> {
    const query = validateString(text, "text", { maxLength: 5000 });
    const limit = validateLimit(options.limit ?? 10);
    const threshold = validateThreshold(options.threshold ?? this.thresholds.fuzzy);

    return searchFuzzy(await this.groupedRecords(), query, { threshold, limit });
  }

  async findDuplicateTitles(): Promise<DuplicateTitle[]> {
    return findDuplicateTitles(await this.groupedRecords());
  }

  private async groupedRecords(): Promise<GroupedRecord[]> {
    return (await this.repository.listBatches()).flatMap(toGroupedRecords);
  }
}

export function toGroupedRecords(batch: BatchDocument): GroupedRecord[] {
  return batch.concepts.map((concept) => ({ ...concept, group: batch.batchId }));
}
