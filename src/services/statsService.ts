import type { IdeaRepository } from "../domain/ideaRepository.js";
import type { BatchDocument } from "../domain/types.js";
import { splitList } from "../infra/parsers/documentLoader.js";

const TOP_N = 10;

export interface CountEntry {
  name: string;
  count: number;
}

export interface WorkspaceStats {
  totalBatches: number;
  totalConcepts: number;
  totalStories: number;
  storiesInDevelopment: number;
  batchesByStatus: CountEntry[];
  genres: CountEntry[];
  tropes: CountEntry[];
  topGenres: CountEntry[];
  topTropes: CountEntry[];
  recentBatches: BatchDocument[];
}

export class StatsService {
  constructor(private readonly repository: IdeaRepository) {}

  async generate(): Promise<WorkspaceStats> {
    const batches = await this.repository.listBatches();
    const stories = await this.repository.listStories();

    const byStatus = new Counter();
    const genres = new Counter();
    const tropes = new Counter();

    for (const batch of batches) {
      byStatus.add(batch.status ?? "unknown");
      genres.addAll(genreNames(batch.genre));
      tropes.addAll(splitList(batch.tropes));
    }
    for (const story of stories) {
      genres.addAll(genreNames(story.genre));
      tropes.addAll(splitList(story.tropes));
    }

    return {
      totalBatches: batches.length,
      totalConcepts: batches.reduce((sum, batch) => sum + batch.count, 0),
      totalStories: stories.length,
      storiesInDevelopment: stories.filter((story) => story.status === "developing").length,
      batchesByStatus: byStatus.entries(),
      genres: genres.entries(),
      tropes: tropes.entries(),
      topGenres: genres.mostCommon(TOP_N),
      topTropes: tropes.mostCommon(TOP_N),
      recentBatches: [...batches]
        .sort((a, b) => (b.dateGenerated ?? "").localeCompare(a.dateGenerated ?? ""))
        .slice(0, TOP_N),
    };
  }
}

function genreNames(genre: string | string[] | null): string[] {
  const names = splitList(genre);
  return names.length > 0 ? names : ["Unknown"];
}

/** Insertion-ordered tally; ties keep first-seen order. */
class Counter {
  private readonly counts = new Map<string, number>();

  add(name: string): void {
    this.counts.set(name, (this.counts.get(name) ?? 0) + 1);
  }

  addAll(names: string[]): void {
    for (const name of names) {
      this.add(name);
    }
  }

  entries(): CountEntry[] {
    return [...this.counts.entries()].map(([name, count]) => ({ name, count }));
  }

  mostCommon(limit: number): CountEntry[] {
    return this.entries()
      .sort((a, b) => b.count - a.count)
      .slice(0, limit);
  }
}
