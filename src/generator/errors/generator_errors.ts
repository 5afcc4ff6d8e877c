/**
 * Generator error types and helpers
 */

/**
 * `ConsumerFileMissing` and `UnknownClassInOverrideTable` are only ever
 * returned as warnings; every other code is thrown.
 */
export type GeneratorErrorCode =
  | "SchemaMissing"
  | "SchemaMalformed"
  | "ExternalToolUnavailable"
  | "ConsumerFileMissing"
  | "UnknownClassInOverrideTable"
  | "ConfigInvalid"
  | "WriteFailed";

export class GeneratorError extends Error {
  readonly code: GeneratorErrorCode;
  readonly filePath?: string;
  readonly suggestion?: string;

  constructor(
    code: GeneratorErrorCode,
    message: string,
    options: { filePath?: string; suggestion?: string; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "GeneratorError";
    this.code = code;
    this.filePath = options.filePath;
    this.suggestion = options.suggestion;
  }

  format(): string {
    const location = this.filePath ? ` ${this.filePath}:` : "";
    const hint = this.suggestion ? `\n  hint: ${this.suggestion}` : "";
    return `[${this.code}]${location} ${this.message}${hint}`;
  }
}

export function describeError(err: unknown): string {
  if (err instanceof GeneratorError) return err.format();
  if (err instanceof Error) return err.message;
  return String(err);
}
