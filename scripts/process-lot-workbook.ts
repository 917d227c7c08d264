import 'dotenv/config';
import pino from 'pino';
import { defaultRuleSet, loadRuleSet } from '../src/config/ruleSet';
import { defaultOutputPath, processLotWorkbook } from '../src/services/lotTable/runner';

const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: {
    target: 'pino-pretty',
    options: {
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname',
    },
  },
});

function usage(): never {
  console.error('Usage: tsx scripts/process-lot-workbook.ts <input.xlsx> [output.xlsx]');
  process.exit(1);
}

async function main() {
  const [inputPath, outputArg] = process.argv.slice(2);
  if (!inputPath) usage();

  const ruleSet = process.env.RULE_SET_PATH ? loadRuleSet(process.env.RULE_SET_PATH) : defaultRuleSet;
  const outputPath = outputArg || defaultOutputPath(inputPath);

  const summary = await processLotWorkbook(inputPath, outputPath, logger, ruleSet);
  console.log(
    `Processed ${summary.processed} lot(s), skipped ${summary.skipped}, ${summary.manualReview} flagged for manual review -> ${summary.outputPath}`
  );
}

main().catch((err) => {
  logger.error(err, 'Workbook processing failed');
  process.exit(1);
});
