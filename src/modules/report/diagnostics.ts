import path from 'node:path';
import { describeEndpoint, maskedConnectionUrl } from '../../config/environments.js';
import type { ConnectionTestResult } from '../../core/connection-factory.js';
import { FanoutError, getErrorMessage } from '../../core/errors.js';
import type { QueryFile } from '../../core/query-file.js';
import type { EndpointDescriptor } from '../../types/index.js';
import type { ValidationOutcome } from '../validation/types/validation.types.js';

const PREVIEW_LENGTH = 50;
const PREVIEW_LINES = 3;
const RULE = '-'.repeat(50);

const block = (lines: string[]): string => `${lines.join('\n')}\n\n`;

function compareIds(left: string, right: string): number {
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

/**
 * "PostgreSQL 16.2 on x86_64-pc-linux-gnu, ..." becomes "16.2"; MySQL already reports a bare version.
 */
export function shortServerVersion(version: string): string {
  const parts = version.trim().split(/\s+/);
  if (parts[0] === 'PostgreSQL') return parts[1] ?? 'Unknown';
  return parts[0] || 'Unknown';
}

export function formatEnvironmentList(endpoints: readonly EndpointDescriptor[], verbose = false): string {
  const lines = [`=== Loaded ${endpoints.length} Database Environment(s) ===`];
  endpoints.forEach((endpoint, index) => {
    lines.push(`${String(index + 1).padStart(2, '0')}. ${describeEndpoint(endpoint)}`);
    if (verbose) {
      lines.push(`    Connection: ${maskedConnectionUrl(endpoint)}`);
    }
  });
  return block(lines);
}

export function formatConnectionResults(results: readonly ConnectionTestResult[], verbose = false): string {
  const successful = results.filter((result) => result.success).length;
  const lines = [
    '=== Database Connection Test Results ===',
    `Total: ${results.length}, Successful: ${successful}, Failed: ${results.length - successful}`,
    ''
  ];

  const sorted = [...results].sort((left, right) => compareIds(left.endpointId, right.endpointId));
  for (const result of sorted) {
    const status = result.success ? '✓' : '✗';
    const duration = `${Math.round(result.durationMs)}ms`.padStart(6);
    lines.push(`${status} ${result.endpointId.padEnd(15)} (${duration}) - ${result.message}`);

    if (verbose && result.success && result.serverVersion) {
      lines.push(`    Server Version: ${shortServerVersion(result.serverVersion)}`);
    }
    if (verbose && !result.success && result.errorCode) {
      lines.push(`    Error Code: ${result.errorCode}`);
    }
  }

  return block(lines);
}

export function formatProbeWarning(failedCount: number, verbose = false): string {
  const lines = [`Warning: ${failedCount} database connection(s) failed.`];
  if (!verbose) {
    lines.push('Use --verbose flag to see detailed error information.');
  }
  lines.push('Proceeding with available connections...');
  return block(lines);
}

export function formatValidationResult(outcome: ValidationOutcome, verbose = false): string {
  const lines = [
    '=== Query Validation Results ===',
    `Valid: ${outcome.isValid ? '✓ Yes' : '✗ No'}`,
    `Statements Found: ${outcome.statementCount}`
  ];

  if (!outcome.isValid && outcome.errorMessage) {
    lines.push(`Error: ${outcome.errorMessage}`);
  }

  if (verbose && outcome.statements.length > 0) {
    lines.push('', 'Statement Details:');
    for (const statement of outcome.statements) {
      lines.push(`  ${statement.isValid ? '✓' : '✗'} Statement ${statement.index}: ${statement.statementType}`);
      if (!statement.isValid && statement.errorMessage) {
        lines.push(`    Error: ${statement.errorMessage}`);
      }
      const preview =
        statement.rawText.length > PREVIEW_LENGTH
          ? `${statement.rawText.slice(0, PREVIEW_LENGTH)}...`
          : statement.rawText;
      lines.push(`    Preview: ${preview.replace(/[\r\n]/g, ' ')}`);
    }
  }

  return block(lines);
}

export function formatQueryFileSummary(file: QueryFile, verbose = false): string {
  const fileLines = file.content.split('\n');
  const nonEmpty = fileLines.filter((line) => line.trim().length > 0).length;
  const lines = [
    `=== SQL Query File: ${path.basename(file.path)} ===`,
    `File Size: ${file.sizeBytes} bytes`,
    `Total Lines: ${fileLines.length}, Non-empty Lines: ${nonEmpty}`
  ];

  if (verbose) {
    lines.push('Query Content:', RULE);
    fileLines.forEach((line, index) => {
      lines.push(`${String(index + 1).padStart(3)}: ${line}`);
    });
    lines.push(RULE);
    return block(lines);
  }

  const preview = fileLines.slice(0, PREVIEW_LINES).filter((line) => line.trim().length > 0);
  if (preview.length > 0) {
    lines.push('Preview:', ...preview.map((line) => `  ${line.trim()}`));
    if (fileLines.length > PREVIEW_LINES) {
      lines.push('  ... (use --verbose to see full content)');
    }
  }
  return block(lines);
}

export function formatRunHeader(queryLabel: string, endpointCount: number): string {
  return block([`=== Query Results: ${queryLabel} ===`, `Executing against ${endpointCount} database(s)...`]);
}

/**
 * Generic report for an error that reached the top level. Details and the
 * stack trace are only included in verbose mode.
 */
export function formatFatalError(error: unknown, verbose = false): string {
  const lines = [`Error: ${getErrorMessage(error)}`];
  if (verbose && error instanceof FanoutError && error.details) {
    lines.push(`Details: ${error.details}`);
  }
  if (verbose && error instanceof Error && error.stack) {
    lines.push(`Stack trace: ${error.stack}`);
  }
  return `${lines.join('\n')}\n`;
}
