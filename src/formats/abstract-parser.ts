/**
 * Abstract base parser with shared option merging and interrupt handling
 *
 * Gives every parser the same AbortSignal support and the same default
 * error and warning hooks without imposing how the text is parsed.
 */

import { ParseError } from "../errors";
import type { FileReaderOptions, ParserOptions } from "../types";

/**
 * Base options after defaults have been applied
 */
export interface ResolvedParserOptions {
  maxLineLength: number;
  trackLineNumbers: boolean;
  onError: (error: string, lineNumber?: number) => void;
  onWarning: (warning: string, lineNumber?: number) => void;
}

/**
 * Abstract parser base class
 *
 * @template T - What one parse produces
 * @template TOptions - Parser options, extending the shared base options
 */
export abstract class AbstractParser<T, TOptions extends ParserOptions = ParserOptions> {
  protected readonly options: TOptions & ResolvedParserOptions;
  private readonly interruptHandler: InterruptHandler;

  constructor(options: TOptions) {
    // Merge base defaults, format-specific defaults, and user options
    const baseDefaults: ResolvedParserOptions = {
      maxLineLength: 1_000_000,
      trackLineNumbers: true,
      onError: (error: string, lineNumber?: number): void => {
        throw new ParseError(error, lineNumber);
      },
      onWarning: (warning: string, lineNumber?: number): void => {
        console.warn(`${this.getFormatName()} Warning (line ${lineNumber}): ${warning}`);
      },
    };

    const formatDefaults = this.getDefaultOptions();

    // Merge in order: base -> format-specific -> user options
    this.options = {
      ...formatDefaults,
      ...options,
      maxLineLength: options.maxLineLength ?? formatDefaults.maxLineLength ?? baseDefaults.maxLineLength,
      trackLineNumbers:
        options.trackLineNumbers ?? formatDefaults.trackLineNumbers ?? baseDefaults.trackLineNumbers,
      onError: options.onError ?? formatDefaults.onError ?? baseDefaults.onError,
      onWarning: options.onWarning ?? formatDefaults.onWarning ?? baseDefaults.onWarning,
    };
    this.interruptHandler = new InterruptHandler(this.options.signal);
  }

  /**
   * Format-specific default options
   */
  protected abstract getDefaultOptions(): Partial<TOptions>;

  // ============================================================================
  // SHARED INTERRUPT HANDLING
  // ============================================================================

  /**
   * Check if parsing should stop; call inside parsing loops
   */
  protected checkAborted(): void {
    this.interruptHandler.checkAborted();
  }

  protected throwIfAborted(context: string): void {
    this.interruptHandler.throwIfAborted(`${this.getFormatName()} ${context}`);
  }

  /**
   * Line number to report, honouring `trackLineNumbers`
   */
  protected reportedLine(lineNumber: number): number | undefined {
    return this.options.trackLineNumbers ? lineNumber : undefined;
  }

  // ============================================================================
  // ABSTRACT METHODS
  // ============================================================================

  /**
   * Parse a whole document held in memory
   */
  abstract parseString(data: string): T;

  /**
   * Read and parse a file
   */
  abstract parseFile(filePath: string, options?: FileReaderOptions): Promise<T>;

  /**
   * Format name for error messages and logging (e.g. "SFM")
   */
  protected abstract getFormatName(): string;
}

/**
 * AbortSignal adapter shared by all parsers
 */
class InterruptHandler {
  constructor(private readonly signal?: AbortSignal) {}

  /**
   * @throws {ParseError} If the operation was aborted
   */
  checkAborted(): void {
    if (this.signal?.aborted === true) {
      throw new ParseError("Operation was aborted", undefined, undefined, "ABORTED");
    }
  }

  /**
   * @throws {ParseError} If the operation was aborted
   */
  throwIfAborted(context: string): void {
    if (this.signal?.aborted === true) {
      throw new ParseError(`Operation aborted during ${context}`, undefined, undefined, "ABORTED");
    }
  }
}
