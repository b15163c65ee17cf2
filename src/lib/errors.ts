import type { InputFormat, SourcePosition } from "@/types/zone";

/**
 * A single rejected field. `path` and `position` point at the node in the
 * source document that carried the bad value.
 */
export interface ValidationIssue {
  path: string;
  position?: SourcePosition;
  message: string;
}

/**
 * Base class for every failure the pipeline reports. `status` is the process
 * exit code the CLI uses for it.
 */
export class ZoneConfigError extends Error {
  status = 1;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The input does not conform to the chosen surface syntax */
export class DecodeError extends ZoneConfigError {
  constructor(
    readonly format: InputFormat,
    readonly issue: ValidationIssue,
  ) {
    super(formatDiagnostic(format, issue));
  }
}

/** One or more fields violate a domain rule */
export class ValidationError extends ZoneConfigError {
  constructor(
    readonly format: InputFormat,
    readonly issues: ValidationIssue[],
  ) {
    super(issues.map((issue) => formatDiagnostic(format, issue)).join("\n"));
  }
}

/** A conflict found while deriving records from valid configuration */
export class TransformError extends ZoneConfigError {
  constructor(
    message: string,
    readonly zone?: string,
  ) {
    super(zone ? `${zone}: ${message}` : message);
  }
}

/** The persisted serial is unusable or the clock went backwards */
export class SerialError extends ZoneConfigError {}

/**
 * Render an issue as
 * `YAML parse error: Path: 'defaults.ttl', Location: line 2 column 8, Error: TTL cannot be zero`.
 */
export function formatDiagnostic(
  format: InputFormat,
  issue: ValidationIssue,
): string {
  const location = issue.position
    ? `line ${issue.position.line} column ${issue.position.column}`
    : "unknown";
  return `${format.toUpperCase()} parse error: Path: '${issue.path}', Location: ${location}, Error: ${issue.message}`;
}
