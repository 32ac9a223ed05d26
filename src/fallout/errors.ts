// src/fallout/errors.ts

export type SaveFormatErrorCode =
  | "INSUFFICIENT_DATA"
  | "MALFORMED_STRING"
  | "INVALID_VERSION"
  | "INVALID_FLAGS"
  | "UNKNOWN_RECORD_SIZE"
  | "NEGATIVE_COUNT"
  | "MAGIC_MISMATCH"
  | "STRING_TOO_LONG"
  | "VALUE_OUT_OF_RANGE"
  | "INVALID_LAYOUT";

export type SaveFormatErrorOptions = Readonly<{
  offset?: number;
  context?: ReadonlyArray<string>;
  cause?: unknown;
}>;

/**
 * Every decode/encode failure in the codec layer. `offset` is relative to the
 * buffer handed to the failing codec until an orchestrator rebases it with
 * {@link SaveFormatError.rebase}.
 */
export class SaveFormatError extends Error {
  public readonly code: SaveFormatErrorCode;
  public readonly offset: number | undefined;
  public readonly context: ReadonlyArray<string>;

  public constructor(code: SaveFormatErrorCode, message: string, opts: SaveFormatErrorOptions = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "SaveFormatError";
    this.code = code;
    this.offset = opts.offset;
    this.context = opts.context ?? [];
  }

  public rebase(base: number, stage: string): SaveFormatError {
    return new SaveFormatError(this.code, this.message, {
      offset: base + (this.offset ?? 0),
      context: [stage, ...this.context],
      cause: this.cause,
    });
  }

  public describe(): string {
    const where = this.offset === undefined ? "" : ` at 0x${this.offset.toString(16)}`;
    const ctx = this.context.length > 0 ? ` (${this.context.join(" > ")})` : "";
    return `${this.code}${where}${ctx}: ${this.message}`;
  }
}

export function isSaveFormatError(e: unknown): e is SaveFormatError {
  return e instanceof SaveFormatError;
}

export function errorMessage(e: unknown): string {
  if (isSaveFormatError(e)) return e.describe();
  return e instanceof Error ? e.message : String(e);
}
