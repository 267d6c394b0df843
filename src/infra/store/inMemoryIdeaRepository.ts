import type { IdeaRepository } from "../../domain/ideaRepository.js";
import type { BatchDocument, StoryDocument } from "../../domain/types.js";

export interface InMemoryIdeaSnapshot {
  batches: BatchDocument[];
  stories: StoryDocument[];
}

export class InMemoryIdeaRepository implements IdeaRepository {
  readonly root: string;

  private batches: BatchDocument[];

  private stories: StoryDocument[];

  constructor(snapshot: Partial<InMemoryIdeaSnapshot> = {}, root = "memory://workspace") {
    this.root = root;
    this.batches = [...(snapshot.batches ?? [])];
    this.stories = [...(snapshot.stories ?? [])];
  }

  async listBatches(): Promise<BatchDocument[]> {
    return [...this.batches];
  }

  async getBatch(batchId: string): Promise<BatchDocument | null> {
    return this.batches.find((batch) => batch.batchId === batchId) ?? null;
  }

  async listStories(): Promise<StoryDocument[]> {
    return [...this.stories];
  }

  async findStory(name: string): Promise<StoryDocument | null> {
    return this.stories.find((story) => story.name === name) ?? null;
  }

  addBatch(batch: BatchDocument): void {
    this.batches = [...this.batches.filter((item) => item.batchId !== batch.batchId), batch];
  }

  addStory(story: StoryDocument): void {
    this.stories = [...this.stories.filter((item) => item.name !== story.name), story];
  }
}
