import type { ExecutionResult } from './types.js';

export const OUTPUT_ATTACHMENT_NAME = 'output.txt';

export type FormattedOutput =
  | { kind: 'inline'; text: string }
  | {
      kind: 'attachment';
      preview: string;
      attachment: Buffer;
      filename: string;
      note: string;
    };

export interface OutputFormatterOptions {
  /** Longest text returned inline, in characters */
  inlineLimit?: number;
  /** Characters kept in the inline preview of an oversized output */
  previewLength?: number;
}

function statusLine(result: ExecutionResult, timeoutMs?: number): string | null {
  switch (result.status) {
    case 'timeout':
      return (
        `[timed out${timeoutMs ? ` after ${Math.round(timeoutMs / 1000)}s` : ''}` +
        ' - if this was the first run, the image may still be pulling]'
      );
    case 'resource_exceeded':
      return result.resource === 'processes'
        ? '[process limit reached - too many processes or threads]'
        : '[killed: memory limit exceeded]';
    case 'cancelled':
      return '[cancelled]';
    default:
      return null;
  }
}

/**
 * Plain-text rendering of an execution result: stdout, then stderr under a separator,
 * then truncation and status notes.
 */
export function renderExecutionResult(result: ExecutionResult, timeoutMs?: number): string {
  const parts: string[] = [];

  if (result.stdout) {
    parts.push(result.stdout);
  }
  if (result.stderr) {
    parts.push(result.stdout ? `\n--- stderr ---\n${result.stderr}` : result.stderr);
  }
  if (!result.stdout && !result.stderr) {
    parts.push(`(no output, exit code ${result.exitCode})`);
  }
  if (result.truncated) {
    parts.push('\n[output truncated]');
  }

  const status = statusLine(result, timeoutMs);
  if (status) {
    parts.push(`\n${status}`);
  }

  return parts.join('');
}

/**
 * Chooses between inline text and a file attachment for completed output.
 * Oversized output keeps its full bytes in the attachment; only the preview is cut.
 */
export class OutputFormatter {
  readonly inlineLimit: number;
  readonly previewLength: number;

  constructor(options: OutputFormatterOptions = {}) {
    this.inlineLimit = options.inlineLimit ?? 1900;
    this.previewLength = Math.min(options.previewLength ?? 1500, this.inlineLimit);
  }

  format(raw: string, exitCode?: number): FormattedOutput {
    if (raw.length <= this.inlineLimit) {
      return { kind: 'inline', text: raw };
    }

    const exitNote = exitCode === undefined ? '' : ` (exit ${exitCode})`;
    return {
      kind: 'attachment',
      preview: raw.slice(0, this.previewLength),
      attachment: Buffer.from(raw, 'utf-8'),
      filename: OUTPUT_ATTACHMENT_NAME,
      note:
        `Output too long${exitNote}: showing the first ${this.previewLength} of ` +
        `${raw.length} characters, full output attached as ${OUTPUT_ATTACHMENT_NAME}.`,
    };
  }

  /** Last `length` characters of a growing log */
  tail(log: string, length: number): string {
    return log.length <= length ? log : log.slice(log.length - length);
  }
}
