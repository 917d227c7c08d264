import { formatConversionLog, formatFlags, ITEM_TYPE_LABELS, type LotResult } from '../dimensions';
import { DIMENSION_AXES } from '../dimensions/types';

export type CellValue = string | number | boolean | null;

/** One spreadsheet row: original columns plus the computed ones. */
export type LotRow = Record<string, CellValue>;

export const LOT_COLUMN = 'LOT';
export const DESCRIPTION_COLUMN = 'TYPESET';
export const REQUIRED_COLUMNS = [LOT_COLUMN, DESCRIPTION_COLUMN] as const;

const LEADING_RESULT_COLUMNS = ['ITEM_COUNT', 'ITEM_TYPE', 'MATERIAL', 'MANUAL_REVIEW_REQUIRED'] as const;
const TRAILING_RESULT_COLUMNS = ['PROCESSING_FLAGS', 'CONVERSION_LOG'] as const;

export function maxItemCount(results: LotResult[]): number {
  return results.reduce((max, r) => Math.max(max, r.items.length), 0);
}

export function itemColumns(count: number): string[] {
  const columns: string[] = [];
  for (let i = 1; i <= count; i++) {
    for (const axis of DIMENSION_AXES) columns.push(`${axis}_${i}`);
  }
  return columns;
}

/**
 * Column order of the output table: original columns first (unchanged),
 * then the computed ones. Computed names already present in the source are
 * overwritten in place rather than duplicated.
 */
export function outputColumns(originalColumns: string[], itemColumnCount: number): string[] {
  const computed = [...LEADING_RESULT_COLUMNS, ...itemColumns(itemColumnCount), ...TRAILING_RESULT_COLUMNS];
  return [...originalColumns, ...computed.filter((c) => !originalColumns.includes(c))];
}

export function buildLotRow(original: LotRow, result: LotResult, itemColumnCount: number): LotRow {
  const row: LotRow = {
    ...original,
    ITEM_COUNT: result.itemCount.value,
    ITEM_TYPE: ITEM_TYPE_LABELS[result.classification.kind],
    MATERIAL: result.material,
    MANUAL_REVIEW_REQUIRED: result.manualReviewRequired,
  };

  for (let i = 1; i <= itemColumnCount; i++) {
    const item = result.items[i - 1];
    for (const axis of DIMENSION_AXES) {
      row[`${axis}_${i}`] = item ? item[axis] : null;
    }
  }

  row.PROCESSING_FLAGS = formatFlags(result.flags);
  row.CONVERSION_LOG = formatConversionLog(result.conversionLog);
  return row;
}

/**
 * Wide table for a batch. Runs after every lot has a result, since the
 * number of item columns depends on the largest item count.
 */
export function buildLotRows(originals: LotRow[], results: LotResult[]): { rows: LotRow[]; itemColumns: number } {
  if (originals.length !== results.length) {
    throw new Error(`[LotTable] ${originals.length} source rows but ${results.length} results`);
  }
  const count = maxItemCount(results);
  return {
    rows: results.map((result, i) => buildLotRow(originals[i], result, count)),
    itemColumns: count,
  };
}
