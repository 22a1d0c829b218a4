export class RecipeIngestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MeasurementError extends RecipeIngestError {}

export class UnrecognizedUnitError extends MeasurementError {
  readonly unit: string;

  constructor(unit: string) {
    super(`Unrecognized unit: ${unit}`);
    this.unit = unit;
  }
}

export class RecipeValidationError extends RecipeIngestError {}

export class ConfigError extends RecipeIngestError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.problems = problems;
  }
}
