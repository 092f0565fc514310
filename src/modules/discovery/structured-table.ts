import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

import type { RawRow } from '../portfolio/types.js';
import { textOf } from './dom.js';

const HEADER_CELLS = 'thead th, thead td';
const DATA_ROWS = 'tbody tr';
const ROW_CELLS = 'td, th';

export interface TableSelection {
  readonly table: Element;
  readonly dataRowCount: number;
}

/** The table with the most data rows; the first one wins a tie. */
export function selectBestTable($: CheerioAPI): TableSelection | null {
  let best: TableSelection | null = null;

  for (const table of $('table').toArray()) {
    const dataRowCount = $(table).find(DATA_ROWS).length;
    if (dataRowCount > (best?.dataRowCount ?? 0)) {
      best = { table, dataRowCount };
    }
  }

  return best;
}

const cellTexts = ($: CheerioAPI, row: Element): string[] =>
  $(row)
    .find(ROW_CELLS)
    .toArray()
    .map((cell) => textOf(cell));

export function extractStructuredTable($: CheerioAPI): RawRow[] {
  const selection = selectBestTable($);
  if (!selection) {
    return [];
  }

  const $table = $(selection.table);
  let headers = $table
    .find(HEADER_CELLS)
    .toArray()
    .map((cell) => textOf(cell));
  let dataRows = $table.find(DATA_ROWS).toArray();

  if (headers.length === 0) {
    const headerRow = $table.find('tr').get(0);
    headers = headerRow ? cellTexts($, headerRow) : [];
    dataRows = dataRows.filter((row) => row !== headerRow);
  }

  const rows: RawRow[] = [];
  for (const row of dataRows) {
    const cells = cellTexts($, row);
    if (!cells.some((cell) => cell.length > 0)) {
      continue;
    }

    const record = new Map<string, string>();
    cells.forEach((cell, index) => {
      record.set(headers[index] || `col_${index}`, cell);
    });
    rows.push(record);
  }

  return rows;
}
