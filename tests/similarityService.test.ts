import { describe, expect, it } from "vitest";
import { ValidationError } from "../src/domain/errors.js";
import { InMemoryIdeaRepository } from "../src/infra/store/inMemoryIdeaRepository.js";
import { SimilarityService, toGroupedRecords } from "../src/services/similarityService.js";
import { batchWithConcepts } from "./helpers/fixtures.js";

function createService() {
  const repository = new InMemoryIdeaRepository({
    batches: [
      batchWithConcepts("20250101-001", [
        { identifier: "1", title: "Dragons and magic swords", body: "" },
        { identifier: "2", title: "Ember Crown", body: "" },
      ]),
      batchWithConcepts("20250102-001", [
        { identifier: "4", title: "Ember Crown", body: "" },
        { identifier: "5", title: "Magic swords and dragons", body: "" },
      ]),
    ],
  });
  return new SimilarityService(repository, { fuzzy: 0.6, duplicate: 0.8 });
}

describe("SimilarityService", () => {
  it("pairs near-duplicate concepts across batches", async () => {
    const pairs = await createService().findSimilarConcepts();

    expect(pairs).toHaveLength(2);
    expect(pairs[0].score).toBe(1);
    expect([pairs[0].first.title, pairs[0].second.title]).toEqual(["Ember Crown", "Ember Crown"]);
    expect([pairs[1].first.identifier, pairs[1].second.identifier]).toEqual(["1", "5"]);
    expect(pairs[1].score).toBeGreaterThanOrEqual(0.8);
  });

  it("validates the threshold", async () => {
    await expect(createService().findSimilarConcepts({ threshold: 2 })).rejects.toBeInstanceOf(ValidationError);
  });

  it("stops when aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(createService().findSimilarConcepts({ signal: controller.signal })).rejects.toThrow();
  });

  it("finds concepts similar to free text", async () => {
    const matches = await createService().findSimilarToText("magic swords", { limit: 1 });

    expect(matches).toHaveLength(1);
    expect([matches[0].subject.group, matches[0].subject.identifier]).toEqual(["20250101-001", "1"]);
    expect(matches[0].score).toBe(1);
  });

  it("lists titles shared between batches", async () => {
    expect(await createService().findDuplicateTitles()).toEqual([
      { title: "ember crown", groups: ["20250101-001", "20250102-001"] },
    ]);
  });

  it("tags concepts with their batch", () => {
    const batch = batchWithConcepts("20250103-001", [{ identifier: "1", title: "A", body: "b" }]);

    expect(toGroupedRecords(batch)).toEqual([{ identifier: "1", title: "A", body: "b", group: "20250103-001" }]);
  });
});
