/**
 * Error classes raised by the profile engine.
 *
 * Configuration errors surface while a service definition is loaded and abort
 * startup. Schema violations point at a template or format bug. Generation
 * errors abort one profile's generation; the profiler moves on to the next.
 * Parameter validation problems are attached to the parameters instead of
 * being thrown, see InputTemplate.validate().
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ValidationError extends Error {
  readonly problems: { parameter: string; message: string }[];

  constructor(problems: { parameter: string; message: string }[]) {
    super(
      `Parameter validation failed: ${problems.map((p) => `${p.parameter}: ${p.message}`).join("; ")}`
    );
    this.name = "ValidationError";
    this.problems = problems;
  }
}

export class SchemaViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SchemaViolation";
  }
}

export class InvalidValue extends SchemaViolation {
  constructor(message: string) {
    super(message);
    this.name = "InvalidValue";
  }
}

export class IncompleteMetadata extends SchemaViolation {
  constructor(message: string) {
    super(message);
    this.name = "IncompleteMetadata";
  }
}

export class GenerationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "GenerationError";
  }
}

export class UnresolvableOutputTemplate extends GenerationError {
  constructor(message: string) {
    super(message);
    this.name = "UnresolvableOutputTemplate";
  }
}

export class NoMatchingInput extends GenerationError {
  constructor(message: string) {
    super(message);
    this.name = "NoMatchingInput";
  }
}

export class DanglingParent extends GenerationError {
  constructor(message: string) {
    super(message);
    this.name = "DanglingParent";
  }
}

export class AmbiguousCopySource extends GenerationError {
  constructor(message: string) {
    super(message);
    this.name = "AmbiguousCopySource";
  }
}
