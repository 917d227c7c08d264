import { isReviewRequired } from './flags';
import type { Classification, FlagCode, ProcessingFlag, ResolvedItem } from './types';

/**
 * Trace Builder - accumulates flags and the conversion log for one lot.
 *
 * Flags are deduplicated (first raise wins the position); log lines never are.
 * Raising a flag always writes a log line so that every flag can be traced
 * back to the decision that produced it.
 */
export class LotTrace {
  private readonly flagCodes: FlagCode[] = [];
  private readonly lines: string[] = [];

  /**
   * Append a log line for a transformation decision
   */
  note(message: string): this {
    this.lines.push(message);
    return this;
  }

  /**
   * Raise a flag and log why
   */
  raise(code: FlagCode, reason: string): this {
    if (!this.flagCodes.includes(code)) this.flagCodes.push(code);
    this.lines.push(`${code}: ${reason}`);
    return this;
  }

  has(code: FlagCode): boolean {
    return this.flagCodes.includes(code);
  }

  get flags(): ProcessingFlag[] {
    return this.flagCodes.map((code) => ({ code, reviewRequired: isReviewRequired(code) }));
  }

  get log(): string[] {
    return [...this.lines];
  }
}

export function isUnresolvedItem(item: ResolvedItem): boolean {
  return item.H === null && item.L === null && item.D === null;
}

export function computeManualReviewRequired(params: {
  classification: Classification;
  flags: ProcessingFlag[];
  items: ResolvedItem[];
}): boolean {
  if (params.classification.kind === 'Indeterminate') return true;
  if (params.flags.some((f) => f.reviewRequired)) return true;
  return params.items.some(isUnresolvedItem);
}

export function formatFlags(flags: ProcessingFlag[]): string {
  return flags.map((f) => f.code).join(';');
}

export function formatConversionLog(lines: string[]): string {
  return lines.join(' | ');
}
