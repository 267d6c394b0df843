import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import type { BatchDocument, BatchLocation, ConceptRecord, StoryDocument } from "../../src/domain/types.js";
import {
  parseFrontmatterDocument,
  toBatchDocument,
  toStoryDocument,
} from "../../src/infra/parsers/documentLoader.js";

export const EMBER_BATCH = `---
batch_id: 20250101-001
date_generated: 2025-01-01
genre: Romantasy
tropes: enemies to lovers, fated mates
count: 2
status: generated
llm_model: test-model
prompt_used: Write two romantasy concepts
notes: ""
---

# Concept Batch 20250101-001

## Concept 1: Ember Crown

**High Concept**: A thief steals a crown that binds her to the fire king.

**Synopsis**: Mira breaks into the palace vault.
She escapes with a cursed crown.

**Key Elements**:
- Cursed crown
- Fire magic

**Initial Thoughts**: Strong opening hook.

## Concept 2: Tide Singer

**High Concept**: A siren falls for the lighthouse keeper she was sent to drown.

**Synopsis**: Nerys must choose between the sea queen and a mortal.
`;

export const FOREST_BATCH = `---
batch_id: 20250102-001
date_generated: 2025-01-02
genre:
  - Fantasy
  - Romance
tropes:
  - found family
  - enemies to lovers
count: 1
status: favorites
llm_model: test-model
---

## Concept 1: Glass Forest

**High Concept**: Dryads guard a forest made of glass.

**Synopsis**: A glassblower apprentice must bargain with the dryad queen.
`;

export const EMBER_STORY = `---
story_id: the-ember-crown-1736000000
title: The Ember Crown
genre: Romantasy
subgenre: Court intrigue
tropes:
  - enemies to lovers
  - forced proximity
status: developing
origin_batch: 20250101-001
date_created: 2025-01-05
date_updated: 2025-01-06
target_length: novel
---

# The Ember Crown

## Core Concept

**High Concept**: A thief steals a crown that binds her to the fire king.

## Characters

### Protagonist
Mira, a vault thief.

## Plot
Act one: the vault heist.

## Development Notes

## Next Steps
- Outline act two
`;

export const TIDE_STORY = `---
story_id: tide-singer-1735900000
title: Tide Singer
genre: Fantasy
tropes: second chance
status: idea
date_created: 2025-01-03
date_updated: 2025-01-10
target_length: novella
---

# Tide Singer
`;

export const FIXED_NOW = new Date(2025, 0, 15, 9, 30, 0);

export const fixedClock = () => FIXED_NOW;

export function makeBatch(
  raw: string,
  location: BatchLocation,
  root = "/ws",
): BatchDocument {
  const document = parseFrontmatterDocument(raw, "fixture.md");
  const batchId = String(document.data.batch_id);
  return toBatchDocument(document, path.join(root, "concepts", location, `${batchId}.md`), location);
}

export function makeStory(raw: string, name: string, root = "/ws"): StoryDocument {
  const filePath = path.join(root, "stories", `${name}.md`);
  return toStoryDocument(parseFrontmatterDocument(raw, filePath), filePath);
}

export function batchWithConcepts(batchId: string, concepts: ConceptRecord[]): BatchDocument {
  return {
    batchId,
    dateGenerated: null,
    genre: null,
    tropes: null,
    count: concepts.length,
    status: null,
    llmModel: null,
    promptUsed: null,
    notes: null,
    location: "generated",
    filePath: `/ws/concepts/generated/${batchId}.md`,
    content: "",
    concepts,
    frontmatter: { batch_id: batchId },
  };
}

/** A temporary workspace holding two batches and two stories. */
export async function createWorkspace(): Promise<string> {
  const root = await fs.mkdtemp(path.join(os.tmpdir(), "idea-factory-"));
  await writeFile(root, "concepts/generated/20250101-001.md", EMBER_BATCH);
  await writeFile(root, "concepts/favorites/20250102-001.md", FOREST_BATCH);
  await writeFile(root, "stories/the-ember-crown.md", EMBER_STORY);
  await writeFile(root, "stories/tide-singer.md", TIDE_STORY);
  return root;
}

export async function createEmptyDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), "idea-factory-empty-"));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeFile(root: string, relativePath: string, content: string): Promise<string> {
  const filePath = path.join(root, relativePath);
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, "utf-8");
  return filePath;
}
