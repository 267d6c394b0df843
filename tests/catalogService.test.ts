import { describe, expect, it } from "vitest";
import {
  BatchNotFoundError,
  ConceptNotFoundError,
  ResourceError,
  StoryNotFoundError,
  ValidationError,
} from "../src/domain/errors.js";
import { InMemoryIdeaRepository } from "../src/infra/store/inMemoryIdeaRepository.js";
import { CatalogService } from "../src/services/catalogService.js";
import {
  EMBER_BATCH,
  EMBER_STORY,
  FOREST_BATCH,
  makeBatch,
  makeStory,
  TIDE_STORY,
} from "./helpers/fixtures.js";

function createCatalog() {
  const repository = new InMemoryIdeaRepository({
    batches: [makeBatch(EMBER_BATCH, "generated"), makeBatch(FOREST_BATCH, "favorites")],
    stories: [makeStory(EMBER_STORY, "the-ember-crown"), makeStory(TIDE_STORY, "tide-singer")],
  });
  return new CatalogService(repository);
}

describe("CatalogService", () => {
  it("lists batches newest first by default", async () => {
    const batches = await createCatalog().listBatches();

    expect(batches.map((batch) => batch.batchId)).toEqual(["20250102-001", "20250101-001"]);
  });

  it("sorts batches by count and genre", async () => {
    const catalog = createCatalog();

    expect((await catalog.listBatches({ sort: "count" })).map((batch) => batch.count)).toEqual([2, 1]);
    expect((await catalog.listBatches({ sort: "genre" })).map((batch) => batch.batchId)).toEqual([
      "20250102-001",
      "20250101-001",
    ]);
  });

  it("filters batches by genre substring and exact status", async () => {
    const catalog = createCatalog();

    expect((await catalog.listBatches({ genre: "ROMANCE" })).map((batch) => batch.batchId)).toEqual([
      "20250102-001",
    ]);
    expect((await catalog.listBatches({ status: "generated" })).map((batch) => batch.batchId)).toEqual([
      "20250101-001",
    ]);
    expect(await catalog.listBatches({ status: "gen" })).toEqual([]);
  });

  it("lists stories by last update by default", async () => {
    const catalog = createCatalog();

    expect((await catalog.listStories()).map((story) => story.name)).toEqual(["tide-singer", "the-ember-crown"]);
    expect((await catalog.listStories({ sort: "title" })).map((story) => story.name)).toEqual([
      "the-ember-crown",
      "tide-singer",
    ]);
    expect((await catalog.listStories({ sort: "created" })).map((story) => story.name)).toEqual([
      "the-ember-crown",
      "tide-singer",
    ]);
    expect((await catalog.listStories({ status: "idea" })).map((story) => story.name)).toEqual(["tide-singer"]);
  });

  it("reports unknown and malformed lookups", async () => {
    const catalog = createCatalog();

    await expect(catalog.getBatch("20250199-001")).rejects.toBeInstanceOf(BatchNotFoundError);
    await expect(catalog.getBatch("bad")).rejects.toBeInstanceOf(ValidationError);
    await expect(catalog.getStory("ghost")).rejects.toBeInstanceOf(StoryNotFoundError);
  });

  it("reviews a whole batch or one concept", async () => {
    const catalog = createCatalog();

    const whole = await catalog.reviewBatch("20250101-001");
    expect(whole.markdown.startsWith("# Concept Batch 20250101-001")).toBe(true);

    const single = await catalog.reviewBatch("20250101-001", { concept: 2 });
    expect(single.markdown).toBe(
      [
        "## Concept 2: Tide Singer",
        "",
        "**High Concept**: A siren falls for the lighthouse keeper she was sent to drown.",
        "",
        "**Synopsis**: Nerys must choose between the sea queen and a mortal.",
      ].join("\n"),
    );
  });

  it("names the valid range for a missing concept", async () => {
    await expect(createCatalog().reviewBatch("20250101-001", { concept: 9 })).rejects.toThrow(
      new ConceptNotFoundError("20250101-001", 9, 2).message,
    );
  });

  it("reviews a story section", async () => {
    const catalog = createCatalog();

    const review = await catalog.reviewStory("the-ember-crown", { section: "plot" });
    expect(review.markdown).toBe("## Plot\nAct one: the vault heist.\n");

    await expect(catalog.reviewStory("the-ember-crown", { section: "epilogue" })).rejects.toThrow(
      new ResourceError("Section 'epilogue' not found in story 'the-ember-crown'.").message,
    );
  });
});
