import { describe, expect, it } from "vitest";
import { InMemoryIdeaRepository } from "../src/infra/store/inMemoryIdeaRepository.js";
import { StatsService } from "../src/services/statsService.js";
import {
  batchWithConcepts,
  EMBER_BATCH,
  EMBER_STORY,
  FOREST_BATCH,
  makeBatch,
  makeStory,
  TIDE_STORY,
} from "./helpers/fixtures.js";

describe("StatsService", () => {
  it("summarizes batches and stories", async () => {
    const repository = new InMemoryIdeaRepository({
      batches: [makeBatch(EMBER_BATCH, "generated"), makeBatch(FOREST_BATCH, "favorites")],
      stories: [makeStory(EMBER_STORY, "the-ember-crown"), makeStory(TIDE_STORY, "tide-singer")],
    });

    const stats = await new StatsService(repository).generate();

    expect(stats.totalBatches).toBe(2);
    expect(stats.totalConcepts).toBe(3);
    expect(stats.totalStories).toBe(2);
    expect(stats.storiesInDevelopment).toBe(1);
    expect(stats.batchesByStatus).toEqual([
      { name: "generated", count: 1 },
      { name: "favorites", count: 1 },
    ]);
    expect(stats.topGenres).toEqual([
      { name: "Romantasy", count: 2 },
      { name: "Fantasy", count: 2 },
      { name: "Romance", count: 1 },
    ]);
    expect(stats.topTropes).toEqual([
      { name: "enemies to lovers", count: 3 },
      { name: "fated mates", count: 1 },
      { name: "found family", count: 1 },
      { name: "forced proximity", count: 1 },
      { name: "second chance", count: 1 },
    ]);
    expect(stats.recentBatches.map((batch) => batch.batchId)).toEqual(["20250102-001", "20250101-001"]);
  });

  it("counts missing genres and statuses as unknown", async () => {
    const repository = new InMemoryIdeaRepository();
    repository.addBatch(batchWithConcepts("20250103-001", []));

    const stats = await new StatsService(repository).generate();

    expect(stats.genres).toEqual([{ name: "Unknown", count: 1 }]);
    expect(stats.batchesByStatus).toEqual([{ name: "unknown", count: 1 }]);
    expect(stats.tropes).toEqual([]);
  });

  it("caps the top lists at ten entries", async () => {
    const repository = new InMemoryIdeaRepository();
    for (let day = 1; day <= 12; day += 1) {
      const batch = batchWithConcepts(`202501${String(day).padStart(2, "0")}-001`, []);
      repository.addBatch({ ...batch, genre: `Genre ${day}`, dateGenerated: `2025-01-${String(day).padStart(2, "0")}` });
    }

    const stats = await new StatsService(repository).generate();

    expect(stats.genres).toHaveLength(12);
    expect(stats.topGenres).toHaveLength(10);
    expect(stats.recentBatches[0].batchId).toBe("20250112-001");
    expect(stats.recentBatches).toHaveLength(10);
  });
});
