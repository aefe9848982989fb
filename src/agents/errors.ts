export class TimeoutError extends Error {
  constructor(
    public readonly agent: string,
    public readonly timeoutMs: number
  ) {
    super(`Agent ${agent} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * The model never produced a response matching the schema within the
 * retry budget.
 */
export class SchemaValidationError extends Error {
  constructor(
    public readonly agent: string,
    public readonly issues: string[],
    public readonly attempts: number
  ) {
    super(
      `Agent ${agent} failed schema validation after ${attempts} attempts: ${issues.join('; ')}`
    );
    this.name = 'SchemaValidationError';
  }
}

export class AgentExecutionError extends Error {
  constructor(
    public readonly agent: string,
    public readonly originalError: Error
  ) {
    super(`Agent ${agent} execution failed: ${originalError.message}`);
    this.name = 'AgentExecutionError';
    this.cause = originalError;
  }
}

/** Input is unusable; nothing was sent to the model. */
export class PreconditionError extends Error {
  constructor(
    public readonly agent: string,
    public readonly reason: string
  ) {
    super(`Agent ${agent} precondition failed: ${reason}`);
    this.name = 'PreconditionError';
  }
}

export class IncompleteExtractionError extends Error {
  constructor(
    public readonly agent: string,
    public readonly missingFields: string[]
  ) {
    super(`Agent ${agent} left required fields unset: ${missingFields.join(', ')}`);
    this.name = 'IncompleteExtractionError';
  }
}
