import { readFileSync } from 'fs';
import { z } from 'zod';
import defaultRuleSetJson from './rulesets/default.json';

const keywordList = z.array(z.string().trim().min(1)).default([]);

export const SELECTION_POLICIES = ['max_height_length', 'max_area', 'max_axis'] as const;

export const ruleSetSchema = z.object({
  name: z.string().min(1),
  // Placeholder depth (cm) given to flat works.
  twoDDepth: z.number().positive().default(5),
  // Above this many items, replicated dimensions are not trusted.
  highCountThreshold: z.number().int().positive().default(10),
  selectionPolicy: z.enum(SELECTION_POLICIES).default('max_height_length'),
  numberWords: z.record(z.string().min(1), z.number().int().min(2)),
  pairWords: keywordList,
  setIdioms: keywordList,
  twoDTechniques: keywordList,
  // Flat supports; weaker than furniture keywords ("valise ... doublure en toile").
  twoDSupports: keywordList,
  framedForRemovalCues: keywordList,
  assemblageKeywords: keywordList,
  forceThreeDKeywords: keywordList,
  threeDKeywords: keywordList,
  panelKeywords: keywordList,
  reliefCues: keywordList,
  rugKeywords: keywordList,
  curtainKeywords: keywordList,
  bookKeywords: keywordList,
  complexKeywords: keywordList,
  openClosedKeywords: keywordList,
  materials: z.record(z.string().min(1), z.string().min(1)).default({}),
});

export type RuleSet = z.infer<typeof ruleSetSchema>;
export type SelectionPolicyName = RuleSet['selectionPolicy'];

export class RuleSetError extends Error {
  readonly code = 'INVALID_RULE_SET';
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'RuleSetError';
    this.issues = issues;
  }
}

/**
 * Validates a raw rule set (parsed JSON or an object literal in tests).
 * Keyword lists are lower-cased so matching never depends on how a
 * rule set author capitalised them.
 */
export function parseRuleSet(raw: unknown, origin = 'rule set'): RuleSet {
  const parsed = ruleSetSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new RuleSetError(`[RuleSet] Invalid ${origin}: ${issues.join('; ')}`, issues);
  }

  const rs = parsed.data;
  const lower = (list: string[]) => list.map((k) => k.toLowerCase());
  return {
    ...rs,
    numberWords: Object.fromEntries(Object.entries(rs.numberWords).map(([k, v]) => [k.toLowerCase(), v])),
    pairWords: lower(rs.pairWords),
    setIdioms: lower(rs.setIdioms),
    twoDTechniques: lower(rs.twoDTechniques),
    twoDSupports: lower(rs.twoDSupports),
    framedForRemovalCues: lower(rs.framedForRemovalCues),
    assemblageKeywords: lower(rs.assemblageKeywords),
    forceThreeDKeywords: lower(rs.forceThreeDKeywords),
    threeDKeywords: lower(rs.threeDKeywords),
    panelKeywords: lower(rs.panelKeywords),
    reliefCues: lower(rs.reliefCues),
    rugKeywords: lower(rs.rugKeywords),
    curtainKeywords: lower(rs.curtainKeywords),
    bookKeywords: lower(rs.bookKeywords),
    complexKeywords: lower(rs.complexKeywords),
    openClosedKeywords: lower(rs.openClosedKeywords),
    materials: Object.fromEntries(Object.entries(rs.materials).map(([k, v]) => [k.toLowerCase(), v])),
  };
}

export function loadRuleSet(filePath: string): RuleSet {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new RuleSetError(`[RuleSet] Could not read ${filePath}: ${reason}`);
  }
  return parseRuleSet(raw, filePath);
}

export const defaultRuleSet: RuleSet = parseRuleSet(defaultRuleSetJson, 'default rule set');

/**
 * Returns a copy of the default rule set with selected fields replaced.
 * Used by tests and by callers that only tweak a threshold.
 */
export function withRuleSetOverrides(overrides: Partial<RuleSet>, base: RuleSet = defaultRuleSet): RuleSet {
  return parseRuleSet({ ...base, ...overrides }, `${base.name} (overridden)`);
}
