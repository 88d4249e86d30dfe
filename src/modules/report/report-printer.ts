import { CheckResult, Status, summarize } from '../checker/check-result';

export interface ReportFormatOptions {
  /** Print each result's data below its reason. */
  verbose?: boolean;
}

const INDENT = '   ';

function formatData(data: unknown): string {
  if (typeof data === 'string') return data;
  return JSON.stringify(data, null, 2);
}

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => `${INDENT}${line}`)
    .join('\n');
}

/** One result: `STATUS title`, then the indented reason and (verbose) data. */
export function formatResult(result: CheckResult, options: ReportFormatOptions = {}): string {
  const lines = [`${result.status} ${result.title}`];
  if (result.reason) {
    lines.push(indent(result.reason));
  }
  if (options.verbose && result.data !== undefined) {
    lines.push(indent(formatData(result.data)));
  }
  return lines.join('\n');
}

/** `12 succeeded, 1 failed, 3 skipped` */
export function formatSummary(results: readonly CheckResult[]): string {
  const counts = summarize(results);
  return `${counts[Status.SUCCESS]} succeeded, ${counts[Status.ERROR]} failed, ${counts[Status.SKIPPED]} skipped`;
}

export function formatReport(results: readonly CheckResult[], options: ReportFormatOptions = {}): string {
  return [...results.map((result) => formatResult(result, options)), '', formatSummary(results)].join('\n');
}
