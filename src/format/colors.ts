import pc from "picocolors";

/**
 * Presentation helpers for console output. Build logic passes text through
 * these and never looks at the result.
 */
export interface Formatter {
  highlight(text: string): string;
  success(text: string): string;
  error(text: string): string;
}

export function createFormatter(
  enabled: boolean = pc.isColorSupported
): Formatter {
  const colors = pc.createColors(enabled);
  return {
    highlight: (text) => colors.cyan(text),
    success: (text) => colors.green(text),
    error: (text) => colors.red(text),
  };
}

export const plainFormatter: Formatter = {
  highlight: (text) => text,
  success: (text) => text,
  error: (text) => text,
};
