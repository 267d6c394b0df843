import type { AppConfig } from "../config/env.js";
import type { IdeaRepository } from "../domain/ideaRepository.js";
import { FileSystemIdeaRepository } from "../infra/store/fileSystemIdeaRepository.js";
import { systemClock, type Clock } from "../utils/dates.js";
import { CatalogService } from "./catalogService.js";
import { CreatorService } from "./creatorService.js";
import { ExportService } from "./exportService.js";
import { IndexService } from "./indexService.js";
import { SearchService } from "./searchService.js";
import { SimilarityService } from "./similarityService.js";
import { StatsService } from "./statsService.js";
import { StoryService } from "./storyService.js";

export interface IdeaServices {
  root: string;
  repository: IdeaRepository;
  catalog: CatalogService;
  search: SearchService;
  similarity: SimilarityService;
  stats: StatsService;
  creator: CreatorService;
  stories: StoryService;
  index: IndexService;
  exporter: ExportService;
}

export interface ServiceOverrides {
  repository?: IdeaRepository;
  clock?: Clock;
  bundledTemplatesDir?: string;
}

export function createServices(
  config: Pick<AppConfig, "workspaceRoot" | "fuzzyThreshold" | "duplicateThreshold">,
  overrides: ServiceOverrides = {},
): IdeaServices {
  const root = config.workspaceRoot;
  const clock = overrides.clock ?? systemClock;
  const repository = overrides.repository ?? new FileSystemIdeaRepository(root);
  const catalog = new CatalogService(repository);
  const creator = new CreatorService(root, {
    clock,
    bundledTemplatesDir: overrides.bundledTemplatesDir,
  });

  return {
    root,
    repository,
    catalog,
    search: new SearchService(repository, config.fuzzyThreshold),
    similarity: new SimilarityService(repository, {
      fuzzy: config.fuzzyThreshold,
      duplicate: config.duplicateThreshold,
    }),
    stats: new StatsService(repository),
    creator,
    stories: new StoryService(root, catalog, creator),
    index: new IndexService(root, repository, clock),
    exporter: new ExportService(repository),
  };
}
