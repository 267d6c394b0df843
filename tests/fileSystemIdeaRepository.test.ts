import { afterEach, beforeAll, describe, expect, it } from "vitest";
import { FileSystemIdeaRepository } from "../src/infra/store/fileSystemIdeaRepository.js";
import { configureLogging } from "../src/utils/logger.js";
import { createEmptyDir, createWorkspace, removeDir, writeFile } from "./helpers/fixtures.js";

describe("FileSystemIdeaRepository", () => {
  let root: string | null = null;

  beforeAll(() => {
    configureLogging({ console: false });
  });

  afterEach(async () => {
    if (root) {
      await removeDir(root);
      root = null;
    }
  });

  it("lists batches by location then file name", async () => {
    root = await createWorkspace();
    await writeFile(root, "concepts/developing/20250103-001.md", "---\nbatch_id: 20250103-001\n---\n");
    await writeFile(root, "concepts/generated/20250104-001.md", "---\nbatch_id: 20250104-001\n---\n");
    const repository = new FileSystemIdeaRepository(root);

    const batches = await repository.listBatches();

    expect(batches.map((batch) => [batch.batchId, batch.location])).toEqual([
      ["20250101-001", "generated"],
      ["20250104-001", "generated"],
      ["20250103-001", "developing"],
      ["20250102-001", "favorites"],
    ]);
  });

  it("skips files that fail to parse", async () => {
    root = await createWorkspace();
    await writeFile(root, "concepts/generated/broken.md", "---\nnotes: no id\n---\n");
    await writeFile(root, "concepts/generated/readme.txt", "not markdown");
    const repository = new FileSystemIdeaRepository(root);

    const batches = await repository.listBatches();

    expect(batches.map((batch) => batch.batchId)).toEqual(["20250101-001", "20250102-001"]);
  });

  it("returns empty lists for a bare workspace", async () => {
    root = await createEmptyDir();
    const repository = new FileSystemIdeaRepository(root);

    expect(await repository.listBatches()).toEqual([]);
    expect(await repository.listStories()).toEqual([]);
    expect(await repository.getBatch("20250101-001")).toBeNull();
  });

  it("finds batches and stories by name", async () => {
    root = await createWorkspace();
    const repository = new FileSystemIdeaRepository(root);

    expect((await repository.getBatch("20250102-001"))?.location).toBe("favorites");
    expect((await repository.findStory("the-ember-crown"))?.title).toBe("The Ember Crown");
    expect((await repository.findStory("tide-singer.md"))?.title).toBe("Tide Singer");
    expect(await repository.findStory("missing")).toBeNull();
    expect((await repository.listStories()).map((story) => story.name)).toEqual([
      "the-ember-crown",
      "tide-singer",
    ]);
  });

  it("does not resolve story names outside the stories directory", async () => {
    root = await createWorkspace();
    const repository = new FileSystemIdeaRepository(root);

    expect(await repository.findStory("../concepts/generated/20250101-001")).toBeNull();
  });
});
