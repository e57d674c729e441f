export type ValidationIssue = {
  path: string;
  message: string;
};

export class ValidationError extends Error {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class ArtifactNotLoadedError extends Error {
  constructor(message = "Classifier artifact not loaded. Call load() first.") {
    super(message);
    this.name = "ArtifactNotLoadedError";
  }
}

export class ArtifactLoadError extends Error {
  readonly artifactPath: string;

  constructor(artifactPath: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to load classifier artifact ${artifactPath}: ${message}`, options);
    this.name = "ArtifactLoadError";
    this.artifactPath = artifactPath;
  }
}

export class PersistenceError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} failed: ${detail}`, { cause });
    this.name = "PersistenceError";
    this.operation = operation;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
