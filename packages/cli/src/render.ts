import type { CLIErrorView } from '@yaml-contract/core';

// Minimal ANSI helpers (no external deps)
const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  bold: '\u001B[1m',
};

function colorize(text: string, useColor: boolean, color: string): string {
  if (!useColor) return text;
  return `${color}${text}${ANSI.reset}`;
}

/**
 * Render a boundary error for the terminal: title, location, then the
 * flattened report when there is one.
 */
export function renderCLIView(view: CLIErrorView): string {
  const lines: string[] = [];

  const title = colorize(view.title, view.colors, ANSI.bold);
  lines.push(colorize(title, view.colors, ANSI.red));

  if (view.location) {
    lines.push(view.location);
  }
  if (view.report) {
    lines.push(view.report.trimEnd());
  }

  return `${lines.join('\n')}\n`;
}

export function stripAnsi(input: string): string {
  // Simple ANSI escape code stripper
  const ansiRe =
    /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g; // eslint-disable-line no-control-regex
  return input.replace(ansiRe, '');
}

export default renderCLIView;
