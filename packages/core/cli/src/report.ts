import type {Chalk} from 'chalk';
import {errorToDiagnostic} from '@version-sync/diagnostic';
import {
  formatVersion,
  type DriftReport,
  type DriftRow,
  type MergeReport,
  type VersionSpec,
} from '@version-sync/core';

const HEADER = ['FILE', 'BASELINE', 'HEAD', 'STATUS'];

function version(v: VersionSpec | null): string {
  return v != null ? formatVersion(v) : '-';
}

function statusCell(row: DriftRow, chalk: Chalk): string {
  let flair = row.inSync ? chalk.green('ok') : chalk.red('error');
  let detail = row.error != null ? `${row.status}: ${row.error.message}` : row.status;
  return `${flair} ${detail}`;
}

/**
 * Renders the drift report as an aligned table followed by a one line
 * summary.
 */
export function formatReport(report: DriftReport, chalk: Chalk): string {
  let rows = report.rows.map((row) => [
    row.file,
    version(row.baselineVersion),
    version(row.headVersion),
  ]);

  let widths = [0, 1, 2].map((i) =>
    Math.max(HEADER[i].length, ...rows.map((cells) => cells[i].length)),
  );
  let pad = (cells: Array<string>) =>
    cells.map((cell, i) => cell.padEnd(widths[i])).join('  ');

  let lines = [chalk.bold(`${pad(HEADER.slice(0, 3))}  ${HEADER[3]}`)];
  report.rows.forEach((row, i) => {
    lines.push(`${pad(rows[i])}  ${statusCell(row, chalk)}`);
  });

  let outOfSync = report.rows.filter((row) => !row.inSync).length;
  lines.push('');
  lines.push(
    report.ok
      ? `${chalk.green('ok')} ${report.rows.length} files in sync`
      : `${chalk.red('error')} ${outOfSync} of ${report.rows.length} files out of sync`,
  );

  return lines.join('\n');
}

export function formatReportJson(report: DriftReport): string {
  return JSON.stringify(
    {
      ok: report.ok,
      rows: report.rows.map((row) => ({
        file: row.file,
        baselineVersion:
          row.baselineVersion != null ? formatVersion(row.baselineVersion) : null,
        headVersion:
          row.headVersion != null ? formatVersion(row.headVersion) : null,
        inSync: row.inSync,
        status: row.status,
        ...(row.error != null
          ? {
              error: {
                code: row.error.code,
                diagnostics: errorToDiagnostic(row.error).map(
                  ({message, origin, filePath, line, hints}) => ({
                    message,
                    origin,
                    filePath,
                    line,
                    hints,
                  }),
                ),
              },
            }
          : {}),
      })),
    },
    null,
    2,
  );
}

export function formatMergeReport(
  report: MergeReport,
  chalk: Chalk,
): string {
  return report.files
    .map(({file, resolution, error}) => {
      if (error != null || resolution == null) {
        return `${chalk.red('error')} ${file}: ${error?.message ?? 'not resolved'}`;
      }

      let {resolved, unresolved} = resolution;
      let flair = unresolved.length === 0 ? chalk.green('ok') : chalk.red('error');
      let detail = `${resolved.length} resolved`;
      if (unresolved.length > 0) {
        detail += `, ${unresolved.length} without a version`;
      }
      return `${flair} ${file}: ${detail}`;
    })
    .join('\n');
}
