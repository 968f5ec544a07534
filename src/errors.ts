// Error taxonomy for the knowledge graph engine.
//
// Thrown errors carry a stable code so the tool layer can report them without
// string matching. Parse problems and dangling relations are data, not errors.

export type ErrorCode =
  | 'CROSS_PROJECT_REFERENCE'
  | 'STORE_CONSISTENCY'
  | 'TRANSIENT_IO'
  | 'ENTITY_NOT_FOUND'
  | 'PROJECT_NOT_FOUND'
  | 'PROJECT_CONFLICT'
  | 'INVALID_REFERENCE'
  | 'INVALID_EDIT'
  | 'WORKER_HALTED'
  | 'SYNC_CANCELLED';

export class KnowledgeGraphError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** An id or reference from one project was used against another */
export class CrossProjectReferenceError extends KnowledgeGraphError {
  constructor(entityId: number, projectId: number) {
    super('CROSS_PROJECT_REFERENCE', `Entity ${entityId} does not belong to project ${projectId}`);
  }
}

/** Schema corruption or a failed transaction; halts the project's worker */
export class StoreConsistencyError extends KnowledgeGraphError {
  constructor(message: string, cause?: unknown) {
    super('STORE_CONSISTENCY', message, { cause });
  }
}

/** A read kept failing after retries */
export class TransientIOError extends KnowledgeGraphError {
  readonly path: string;

  constructor(filePath: string, attempts: number, cause?: unknown) {
    super('TRANSIENT_IO', `Could not read ${filePath} after ${attempts} attempt(s): ${errorMessage(cause)}`, { cause });
    this.path = filePath;
  }
}

export class EntityNotFoundError extends KnowledgeGraphError {
  constructor(identifier: string, project: string) {
    super('ENTITY_NOT_FOUND', `No entity matches "${identifier}" in project "${project}"`);
  }
}

export class ProjectNotFoundError extends KnowledgeGraphError {
  constructor(ref: string) {
    super('PROJECT_NOT_FOUND', `Unknown project "${ref}"`);
  }
}

export class ProjectConflictError extends KnowledgeGraphError {
  constructor(message: string) {
    super('PROJECT_CONFLICT', message);
  }
}

export class InvalidReferenceError extends KnowledgeGraphError {
  constructor(message: string) {
    super('INVALID_REFERENCE', message);
  }
}

/** An edit that cannot be applied to the note as it stands */
export class InvalidEditError extends KnowledgeGraphError {
  constructor(message: string) {
    super('INVALID_EDIT', message);
  }
}

/** Writes refused because the project's worker is in the error state */
export class WorkerHaltedError extends KnowledgeGraphError {
  constructor(project: string, reason: string) {
    super('WORKER_HALTED', `Sync for project "${project}" is halted: ${reason}. Run reset_project to resume.`);
  }
}

/** A queued sync task was dropped because its worker stopped */
export class SyncCancelledError extends KnowledgeGraphError {
  constructor(project: string) {
    super('SYNC_CANCELLED', `Sync for project "${project}" was stopped before this task ran`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export function errnoCode(error: unknown): string | undefined {
  return isErrnoException(error) ? error.code : undefined;
}
