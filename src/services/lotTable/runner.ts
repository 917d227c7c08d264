import path from 'path';
import type { Logger } from 'pino';
import { defaultRuleSet, type RuleSet } from '../../config/ruleSet';
import { processLot, type LotResult } from '../dimensions';
import { buildLotRows, DESCRIPTION_COLUMN, LOT_COLUMN, type LotRow } from './layout';
import { readLotWorkbook, writeLotWorkbook } from './workbook';

export type WorkbookRunSummary = {
  outputPath: string;
  processed: number;
  skipped: number;
  manualReview: number;
  itemColumns: number;
};

/** `lots.xlsx` -> `lots_dimensions.xlsx`, next to the input. */
export function defaultOutputPath(inputPath: string): string {
  const { dir, name } = path.parse(inputPath);
  return path.join(dir, `${name}_dimensions.xlsx`);
}

function descriptionOf(row: LotRow): string | null {
  const value = row[DESCRIPTION_COLUMN];
  if (value === null || value === undefined) return null;
  const text = String(value);
  return text.trim() ? text : null;
}

export async function processLotWorkbook(
  inputPath: string,
  outputPath: string,
  logger: Logger,
  ruleSet: RuleSet = defaultRuleSet
): Promise<WorkbookRunSummary> {
  const sheet = await readLotWorkbook(inputPath);
  logger.info({ inputPath, rows: sheet.rows.length, ruleSet: ruleSet.name }, 'Workbook loaded');

  const kept: LotRow[] = [];
  const results: LotResult[] = [];
  let skipped = 0;

  sheet.rows.forEach((row, idx) => {
    const rowNumber = idx + 2;
    const description = descriptionOf(row);
    if (description === null) {
      skipped++;
      logger.warn({ rowNumber, lot: row[LOT_COLUMN] ?? null }, 'Skipped row with empty TYPESET');
      return;
    }

    const lot = row[LOT_COLUMN];
    const lotId = lot === null || lot === undefined || String(lot).trim() === '' ? `row-${rowNumber}` : String(lot);
    const result = processLot({ lotId, description }, ruleSet);
    logger.debug({ lotId, flags: result.flags.map((f) => f.code) }, 'Lot processed');

    kept.push(row);
    results.push(result);
  });

  const { rows, itemColumns } = buildLotRows(kept, results);
  await writeLotWorkbook(outputPath, sheet.columns, rows, itemColumns);

  const summary: WorkbookRunSummary = {
    outputPath,
    processed: results.length,
    skipped,
    manualReview: results.filter((r) => r.manualReviewRequired).length,
    itemColumns,
  };
  logger.info(summary, 'Workbook written');
  return summary;
}
