import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/domain/errors.js";
import { InMemoryIdeaRepository } from "../src/infra/store/inMemoryIdeaRepository.js";
import { buildPreview, SearchService } from "../src/services/searchService.js";
import {
  EMBER_BATCH,
  EMBER_STORY,
  FOREST_BATCH,
  makeBatch,
  makeStory,
} from "./helpers/fixtures.js";

function createRepository() {
  return new InMemoryIdeaRepository({
    batches: [makeBatch(EMBER_BATCH, "generated"), makeBatch(FOREST_BATCH, "favorites")],
    stories: [makeStory(EMBER_STORY, "the-ember-crown")],
  });
}

describe("SearchService", () => {
  it("finds concepts before stories for an exact query", async () => {
    const service = new SearchService(createRepository());

    const hits = await service.search({ query: "crown" });

    expect(hits.map((hit) => [hit.type, hit.title, hit.batchId])).toEqual([
      ["concept", "Ember Crown", "20250101-001"],
      ["story", "The Ember Crown", undefined],
    ]);
    expect(hits[0].file).toBe("/ws/concepts/generated/20250101-001.md");
    expect(hits[0].score).toBeUndefined();
    expect(hits[0].preview.startsWith("Ember Crown \n**High Concept**")).toBe(true);
    expect(hits[0].preview.endsWith("...")).toBe(true);
  });

  it("applies genre, trope and status filters", async () => {
    const service = new SearchService(createRepository());

    expect((await service.search({ query: "forest", genre: "fantasy" })).map((hit) => hit.title)).toEqual([
      "Glass Forest",
    ]);
    expect(await service.search({ query: "forest", genre: "romantasy" })).toEqual([]);
    expect((await service.search({ query: "glass", trope: "found family" })).map((hit) => hit.title)).toEqual([
      "Glass Forest",
    ]);
    expect(await service.search({ query: "glass", trope: "fated" })).toEqual([]);
    expect((await service.search({ query: "a", status: "generated" })).map((hit) => hit.title)).toEqual([
      "Ember Crown",
      "Tide Singer",
    ]);
  });

  it("limits results", async () => {
    const service = new SearchService(createRepository());

    expect(await service.search({ query: "crown", limit: 1 })).toHaveLength(1);
  });

  it("labels untitled stories", async () => {
    const repository = createRepository();
    repository.addStory(makeStory("---\nstatus: idea\n---\nA crown of thorns.\n", "draft"));

    const hits = await new SearchService(repository).search({ query: "thorns" });

    expect(hits.map((hit) => [hit.type, hit.title])).toEqual([["story", "Untitled"]]);
  });

  it("ranks fuzzy matches with scores", async () => {
    const service = new SearchService(createRepository(), 0.6);

    const hits = await service.search({ query: "glass forest dryads", fuzzy: true });

    expect(hits[0].title).toBe("Glass Forest");
    expect(hits[0].score).toBeGreaterThan(0.6);
    expect(hits[0].preview.startsWith("Glass Forest \n**High Concept**: Dryads")).toBe(true);
    expect(hits[0].preview.length).toBeLessThanOrEqual(200);
  });

  it("rejects invalid requests", async () => {
    const service = new SearchService(createRepository());

    await expect(service.search({ query: "  " })).rejects.toThrow("Search query cannot be empty");
    await expect(service.search({ query: "crown", limit: 0 })).rejects.toBeInstanceOf(ValidationError);
    await expect(service.search({ query: "crown", status: "x".repeat(51) })).rejects.toThrow(
      "status must be at most 50 characters, got 51",
    );
  });
});

describe("buildPreview", () => {
  it("marks trimmed sides around the first match", () => {
    expect(buildPreview("abcdefghij", "E", 2)).toBe("...cdefg...");
    expect(buildPreview("abc", "a", 2)).toBe("abc");
  });

  it("falls back to the start of the text", () => {
    expect(buildPreview("xyz", "q")).toBe("xyz");
  });
});
