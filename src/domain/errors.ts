export class IdeaFactoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends IdeaFactoryError {}

export class FileSystemError extends IdeaFactoryError {}

export class TemplateNotFoundError extends FileSystemError {
  constructor(
    readonly templateName: string,
    readonly templateDir: string,
  ) {
    super(
      `Template file '${templateName}' not found in ${templateDir}. Please ensure templates are properly installed.`,
    );
  }
}

export class FileReadError extends FileSystemError {
  constructor(
    readonly filePath: string,
    readonly reason: string,
  ) {
    super(`Failed to read file '${filePath}': ${reason}`);
  }
}

export class FileWriteError extends FileSystemError {
  constructor(
    readonly filePath: string,
    readonly reason: string,
  ) {
    super(`Failed to write file '${filePath}': ${reason}`);
  }
}

export class ParsingError extends IdeaFactoryError {}

export class InvalidFrontmatterError extends ParsingError {
  constructor(
    readonly filePath: string,
    readonly reason: string,
  ) {
    super(`Invalid frontmatter in '${filePath}': ${reason}`);
  }
}

export class MissingMetadataError extends ParsingError {
  constructor(
    readonly filePath: string,
    readonly missingField: string,
  ) {
    super(`Missing required metadata field '${missingField}' in '${filePath}'`);
  }
}

export class ResourceError extends IdeaFactoryError {}

export class BatchNotFoundError extends ResourceError {
  constructor(readonly batchId: string) {
    super(`Batch '${batchId}' not found. Use 'list-batches' to see available batches.`);
  }
}

export class StoryNotFoundError extends ResourceError {
  constructor(readonly storyName: string) {
    super(`Story '${storyName}' not found. Use 'list-stories' to see available stories.`);
  }
}

export class ConceptNotFoundError extends ResourceError {
  constructor(
    readonly batchId: string,
    readonly conceptNumber: number,
    readonly totalConcepts: number,
  ) {
    super(
      `Concept #${conceptNumber} not found in batch '${batchId}'. This batch has ${totalConcepts} concepts (1-${totalConcepts}).`,
    );
  }
}

export class OperationError extends IdeaFactoryError {}

export class CreationError extends OperationError {
  constructor(
    readonly resourceType: string,
    readonly reason: string,
  ) {
    super(`Failed to create ${resourceType}: ${reason}`);
  }
}

export class ExportError extends OperationError {
  constructor(
    readonly format: string,
    readonly reason: string,
  ) {
    super(`Failed to export to ${format}: ${reason}`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
