export class ImportlineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class StageCycleError extends ImportlineError {
  readonly stages: readonly string[];

  constructor(stages: readonly string[]) {
    super(`Stage dependency cycle between: ${stages.join(", ")}`);
    this.stages = stages;
  }
}

export class DuplicateStageError extends ImportlineError {
  readonly stage: string;

  constructor(stage: string) {
    super(`Stage "${stage}" is declared more than once`);
    this.stage = stage;
  }
}

export class ConfigError extends ImportlineError {}
