export class SimError extends Error {
  constructor(message: string, public code: string) {
    super(message);
    this.name = 'SimError';
  }
}

export interface ContentIssue {
  where: string;
  message: string;
}

export class ContentValidationError extends SimError {
  readonly issues: ContentIssue[];
  constructor(issues: ContentIssue[]) {
    super(`Content validation failed:\n${issues.map((i) => `${i.where}: ${i.message}`).join('\n')}`, 'CONTENT_INVALID');
    this.name = 'ContentValidationError';
    this.issues = issues;
  }
}

export class UnknownEntityError extends SimError {
  constructor(id: number) {
    super(`Unknown entity ${id}`, 'UNKNOWN_ENTITY');
    this.name = 'UnknownEntityError';
  }
}

export class UnknownDefinitionError extends SimError {
  constructor(kind: string, id: string) {
    super(`Unknown ${kind} "${id}"`, 'UNKNOWN_DEFINITION');
    this.name = 'UnknownDefinitionError';
  }
}
