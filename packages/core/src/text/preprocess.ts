/** What to do with line breaks in the source text. */
export type NewlineMode = "enter" | "space" | "remove";

/**
 * Clean-up applied to text before it is handed to the engine.
 */
export interface PreprocessOptions {
  /** Turn CRLF and lone CR into LF. */
  readonly normalizeLineEndings: boolean;
  /** Strip leading and trailing whitespace. */
  readonly trim: boolean;
  /** Collapse runs of two or more spaces into one. */
  readonly collapseSpaces: boolean;
  /** `enter` keeps line breaks, `space` turns them into spaces, `remove` drops them. */
  readonly newlineMode: NewlineMode;
  /** Truncate to this many characters. Undefined = no limit. */
  readonly maxLength?: number;
}

export const DEFAULT_PREPROCESS_OPTIONS: PreprocessOptions = {
  normalizeLineEndings: true,
  trim: true,
  collapseSpaces: false,
  newlineMode: "enter",
};

/**
 * Normalize text for typing. The input string is not modified.
 *
 * Steps run in a fixed order: line endings, trim, space collapsing,
 * newline mode, length limit.
 */
export function preprocessText(
  text: string,
  options: Partial<PreprocessOptions> = {},
): string {
  const opts: PreprocessOptions = { ...DEFAULT_PREPROCESS_OPTIONS, ...options };
  let out = text;

  if (opts.normalizeLineEndings) {
    out = out.replace(/\r\n?/g, "\n");
  }
  if (opts.trim) {
    out = out.trim();
  }
  if (opts.collapseSpaces) {
    out = out.replace(/ {2,}/g, " ");
  }

  switch (opts.newlineMode) {
    case "space":
      out = out.replace(/\n/g, " ");
      break;
    case "remove":
      out = out.replace(/\n/g, "");
      break;
    case "enter":
      break;
  }

  if (opts.maxLength !== undefined && opts.maxLength >= 0 && out.length > opts.maxLength) {
    out = out.slice(0, opts.maxLength);
  }
  return out;
}
