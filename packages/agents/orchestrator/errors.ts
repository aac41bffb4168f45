// Errors surfaced to callers of the analysis pipeline
// Everything else is recovered inside the run and recorded as a warning

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/** Invalid input or configuration, detected before any specialist is scheduled */
export class ConfigurationError extends PipelineError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'configuration');
    this.name = 'ConfigurationError';
  }
}

/** Raised on any attempt to change a run after its final decision was recorded */
export class FrozenRunError extends PipelineError {
  constructor(runId: string, operation: string) {
    super(`Run ${runId} is frozen; cannot ${operation}`, 'run');
    this.name = 'FrozenRunError';
  }
}
