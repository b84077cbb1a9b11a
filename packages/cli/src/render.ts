import type { CLIErrorView } from '@codemint/core';
import type { OutputFormat } from './flags.js';

// Minimal ANSI helpers
const ANSI = {
  reset: '\u001B[0m',
  red: '\u001B[31m',
  bold: '\u001B[1m',
};

function colorize(text: string, useColor: boolean, color: string): string {
  if (!useColor) return text;
  return `${color}${text}${ANSI.reset}`;
}

function wrapText(text: string, width: number): string {
  if (!text) return '';
  const words = text.split(/\s+/);
  const lines: string[] = [];
  let line = '';
  for (const word of words) {
    if ((line + (line ? ' ' : '') + word).length > width) {
      if (line) lines.push(line);
      line = word;
    } else {
      line = line ? `${line} ${word}` : word;
    }
  }
  if (line) lines.push(line);
  return lines.join('\n');
}

export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines: string[] = [];

  const title = `❌ ${view.title}`;
  lines.push(
    colorize(colorize(title, view.colors, ANSI.bold), view.colors, ANSI.red)
  );

  if (view.setting) {
    lines.push(wrapText(`⚙️ Setting: ${view.setting}`, width));
  }
  if (view.excerpt) {
    lines.push(wrapText(`Value: ${view.excerpt}`, width));
  }
  if (view.details) {
    lines.push(wrapText(view.details, width));
  }
  if (view.workaround) {
    lines.push(wrapText(`💡 Workaround: ${view.workaround}`, width));
  }

  return lines.join('\n');
}

/**
 * Serialize generated codes; returns '' for an empty ndjson/text list.
 */
export function renderCodes(codes: string[], format: OutputFormat): string {
  switch (format) {
    case 'json':
      return JSON.stringify(codes, null, 2) + '\n';
    case 'ndjson':
      return codes.length > 0
        ? codes.map((code) => JSON.stringify(code)).join('\n') + '\n'
        : '';
    case 'text':
      return codes.length > 0 ? codes.join('\n') + '\n' : '';
  }
}

export function stripAnsi(input: string): string {
  const ansiRe =
    /[\u001B\u009B][[\]()#;?]*(?:\d{1,4}(?:;\d{0,4})*)?[\dA-PR-TZcf-ntqry=><~]/g; // eslint-disable-line no-control-regex
  return input.replace(ansiRe, '');
}
