export class WorkspaceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class WorkspaceNotFoundError extends WorkspaceError {
  constructor(
    readonly entity: 'project' | 'milestone',
    readonly id: number,
  ) {
    super(`${entity === 'project' ? 'Project' : 'Milestone'} not found: ${id}`);
  }
}

export class WorkspaceValidationError extends WorkspaceError {}

export class InvalidTransitionError extends WorkspaceError {}

// Raised when a store transaction could not commit because its inputs changed underneath it
export class WorkspaceConflictError extends WorkspaceError {}
