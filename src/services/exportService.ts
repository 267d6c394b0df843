import { promises as fs } from "node:fs";
import path from "node:path";
import { dump } from "js-yaml";
import { ExportError } from "../domain/errors.js";
import type { IdeaRepository } from "../domain/ideaRepository.js";
import type { BatchDocument, StoryDocument } from "../domain/types.js";
import { formatList } from "../infra/parsers/documentLoader.js";
import { createLogger } from "../utils/logger.js";
import { validateString } from "../utils/validation.js";

const logger = createLogger("export");

export const EXPORT_TYPES = ["batches", "stories", "all"] as const;
export const EXPORT_FORMATS = ["json", "csv", "yaml"] as const;

export type ExportType = (typeof EXPORT_TYPES)[number];
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

type ListValue = string | string[] | null;

export interface ExportedBatch {
  batch_id: string;
  date_generated: string | null;
  genre: ListValue;
  tropes: ListValue;
  count: number;
  status: string | null;
  llm_model: string | null;
  prompt_used: string | null;
  notes: string | null;
  location: string;
  file_path: string;
}

export interface ExportedStory {
  name: string;
  story_id: string | null;
  title: string | null;
  genre: ListValue;
  subgenre: string | null;
  tropes: ListValue;
  status: string | null;
  origin_batch: string | null;
  date_created: string | null;
  date_updated: string | null;
  target_length: string | null;
  file_path: string;
}

export interface ExportData {
  batches?: ExportedBatch[];
  stories?: ExportedStory[];
}

export interface ExportRequest {
  type?: ExportType;
  format?: ExportFormat;
  outputPath: string;
}

export interface ExportResult {
  outputPath: string;
  batchCount: number;
  storyCount: number;
}

const BATCH_COLUMNS = [
  "batch_id",
  "date_generated",
  "genre",
  "tropes",
  "count",
  "status",
  "location",
  "llm_model",
] as const satisfies ReadonlyArray<keyof ExportedBatch>;

const STORY_COLUMNS = [
  "story_id",
  "title",
  "genre",
  "subgenre",
  "tropes",
  "status",
  "date_created",
  "target_length",
] as const satisfies ReadonlyArray<keyof ExportedStory>;

const COMBINED_COLUMNS = ["type", "id", "title", "genre", "date", "status", "count_or_length"];

export class ExportService {
  constructor(private readonly repository: IdeaRepository) {}

  async gather(type: ExportType): Promise<ExportData> {
    const data: ExportData = {};
    if (type === "batches" || type === "all") {
      data.batches = (await this.repository.listBatches()).map(toExportedBatch);
    }
    if (type === "stories" || type === "all") {
      data.stories = (await this.repository.listStories()).map(toExportedStory);
    }
    return data;
  }

  async export(request: ExportRequest): Promise<ExportResult> {
    const type = request.type ?? "all";
    const format = request.format ?? "json";
    const outputPath = path.resolve(validateString(request.outputPath, "output path", { maxLength: 1000 }));

    const data = await this.gather(type);
    const body = renderExport(data, type, format);

    try {
      await fs.mkdir(path.dirname(outputPath), { recursive: true });
      await fs.writeFile(outputPath, body, "utf-8");
    } catch (error) {
      throw new ExportError(format, error instanceof Error ? error.message : String(error));
    }

    const result = {
      outputPath,
      batchCount: data.batches?.length ?? 0,
      storyCount: data.stories?.length ?? 0,
    };
    logger.info(
      `Exported ${result.batchCount} batches and ${result.storyCount} stories to ${outputPath} (${format})`,
    );
    return result;
  }
}

export function renderExport(data: ExportData, type: ExportType, format: ExportFormat): string {
  switch (format) {
    case "json":
      return `${JSON.stringify(data, null, 2)}\n`;
    case "yaml":
      return dump(data, { noRefs: true, lineWidth: -1 });
    case "csv":
      return renderCsv(data, type);
  }
}

function renderCsv(data: ExportData, type: ExportType): string {
  let rows: string[][];
  if (type === "batches") {
    rows = [
      [...BATCH_COLUMNS],
      ...(data.batches ?? []).map((batch) => BATCH_COLUMNS.map((column) => cell(batch[column]))),
    ];
  } else if (type === "stories") {
    rows = [
      [...STORY_COLUMNS],
      ...(data.stories ?? []).map((story) => STORY_COLUMNS.map((column) => cell(story[column]))),
    ];
  } else {
    rows = [
      COMBINED_COLUMNS,
      ...(data.batches ?? []).map((batch) =>
        [
          "batch",
          batch.batch_id,
          `Batch ${batch.batch_id}`,
          batch.genre,
          batch.date_generated,
          batch.status,
          batch.count,
        ].map(cell),
      ),
      ...(data.stories ?? []).map((story) =>
        [
          "story",
          story.story_id,
          story.title,
          story.genre,
          story.date_created,
          story.status,
          story.target_length,
        ].map(cell),
      ),
    ];
  }

  return rows.map((row) => row.map(csvEscape).join(",")).join("\n") + "\n";
}

function cell(value: ListValue | number): string {
  return typeof value === "number" ? String(value) : formatList(value);
}

export function csvEscape(value: string): string {
  if (!/[",\r\n]/.test(value)) {
    return value;
  }
  return `"${value.replaceAll('"', '""')}"`;
}

function toExportedBatch(batch: BatchDocument): ExportedBatch {
  return {
    batch_id: batch.batchId,
    date_generated: batch.dateGenerated,
    genre: batch.genre,
    tropes: batch.tropes,
    count: batch.count,
    status: batch.status,
    llm_model: batch.llmModel,
    prompt_used: batch.promptUsed,
    notes: batch.notes,
    location: batch.location,
    file_path: batch.filePath,
  };
}

function toExportedStory(story: StoryDocument): ExportedStory {
  return {
    name: story.name,
    story_id: story.storyId,
    title: story.title,
    genre: story.genre,
    subgenre: story.subgenre,
    tropes: story.tropes,
    status: story.status,
    origin_batch: story.originBatch,
    date_created: story.dateCreated,
    date_updated: story.dateUpdated,
    target_length: story.targetLength,
    file_path: story.filePath,
  };
}
