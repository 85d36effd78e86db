import type { QueryOutcome, SuccessfulOutcome } from '../execution/types/execution.types.js';
import { escapeCsvValue, formatCsvValue, formatValue } from './value-format.js';

export type OutputMode = 'table' | 'csv';

/**
 * Per-invocation render state. `headerColumns` is null until the CSV header
 * has been written, then holds the columns every later row is projected onto.
 */
export interface RenderSession {
  headerColumns: readonly string[] | null;
}

export function createRenderSession(): RenderSession {
  return { headerColumns: null };
}

/**
 * Position in `columns` for each header column, or -1 when absent. A name that
 * repeats in the header maps to its matching repeat in `columns`.
 */
function projectPositions(header: readonly string[], columns: readonly string[]): number[] {
  const occurrences = new Map<string, number>();
  return header.map((name) => {
    const wanted = occurrences.get(name) ?? 0;
    occurrences.set(name, wanted + 1);

    let seen = 0;
    for (let index = 0; index < columns.length; index += 1) {
      if (columns[index] !== name) continue;
      if (seen === wanted) return index;
      seen += 1;
    }
    return -1;
  });
}

export class ResultRenderer {
  /**
   * Render every outcome through one session. Output equals rendering the
   * outcomes one by one with `renderOne`.
   */
  renderBatch(outcomes: readonly QueryOutcome[], mode: OutputMode): string {
    const session = createRenderSession();
    return outcomes.map((outcome) => this.renderOne(outcome, mode, session)).join('');
  }

  renderOne(outcome: QueryOutcome, mode: OutputMode, session: RenderSession): string {
    return mode === 'csv' ? this.renderCsv(outcome, session) : this.renderTable(outcome);
  }

  private renderTable(outcome: QueryOutcome): string {
    const lines: string[] = [];

    if (outcome.success) {
      const count = outcome.rows.length;
      lines.push(`[${outcome.endpointId}] ✓ ${count} ${count === 1 ? 'row' : 'rows'} (${Math.round(outcome.elapsedMs)}ms)`);
      if (count > 0 && outcome.columns.length > 0) {
        lines.push(...this.tableLines(outcome));
      }
    } else {
      lines.push(`[${outcome.endpointId}] ✗ ${outcome.errorMessage}`);
    }

    lines.push('');
    return `${lines.join('\n')}\n`;
  }

  private tableLines(outcome: SuccessfulOutcome): string[] {
    const formatted = outcome.rows.map((row) => outcome.columns.map((_, index) => formatValue(row[index] ?? null)));
    const widths = outcome.columns.map((column, index) =>
      formatted.reduce((width, cells) => Math.max(width, cells[index]?.length ?? 0), column.length)
    );

    const pad = (cells: readonly string[]) => cells.map((cell, index) => cell.padEnd(widths[index] ?? 0)).join(' | ');

    return [
      pad(outcome.columns),
      widths.map((width) => '-'.repeat(width)).join('-|-'),
      ...formatted.map((cells) => pad(cells))
    ];
  }

  private renderCsv(outcome: QueryOutcome, session: RenderSession): string {
    if (!outcome.success) return '';

    let header = session.headerColumns;
    let text = '';
    if (header === null) {
      if (outcome.rows.length === 0) return '';
      header = outcome.columns;
      session.headerColumns = header;
      text += `${['client_id', ...header].map(escapeCsvValue).join(',')}\n`;
    }

    const positions = projectPositions(header, outcome.columns);
    const endpointField = escapeCsvValue(outcome.endpointId);
    for (const row of outcome.rows) {
      const values = positions.map((position) => formatCsvValue(position < 0 ? null : row[position] ?? null));
      text += `${[endpointField, ...values].join(',')}\n`;
    }
    return text;
  }
}

export const resultRenderer = new ResultRenderer();
