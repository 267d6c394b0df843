import type { BatchDocument, StoryDocument } from "./types.js";

export interface IdeaRepository {
  readonly root: string;
  listBatches(): Promise<BatchDocument[]>;
  getBatch(batchId: string): Promise<BatchDocument | null>;
  listStories(): Promise<StoryDocument[]>;
  findStory(name: string): Promise<StoryDocument | null>;
}
