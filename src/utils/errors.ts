export type FatalCode = "INPUT_PATH" | "CONFIG";

export class FatalError extends Error {
  constructor(
    readonly code: FatalCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** The input location is missing or cannot be read. Aborts the run. */
export class InputPathError extends FatalError {
  constructor(
    readonly inputPath: string,
    detail: string
  ) {
    super("INPUT_PATH", `Input path ${detail}: ${inputPath}`);
  }
}

export class ConfigError extends FatalError {
  constructor(readonly issues: string[]) {
    super("CONFIG", `Invalid configuration: ${issues.join("; ")}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
