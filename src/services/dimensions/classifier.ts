import type { RuleSet } from '../../config/ruleSet';
import { findKeyword, normalizeLotText } from './normalize';
import { LotTrace } from './trace';
import type { Classification, ClassificationKind, ClassificationRule } from './types';

export const ITEM_TYPE_LABELS: Record<ClassificationKind, string> = {
  TwoD: '2D',
  ThreeD: '3D',
  Indeterminate: 'MANUAL_CHECK',
};

/**
 * Material Classifier.
 *
 * Decision order (first applicable rule wins):
 * 1. 2D technique or "à décadrer"           -> 2D (reclassification logged when a 3D cue co-occurs)
 * 2. furniture/luggage keyword              -> 3D
 * 3. assemblage keyword, no flat support    -> 3D, ASSEMBLAGE_3D_MANUAL_CHECK
 * 4. flat support (toile, papier...)        -> 2D (reclassification logged when a 3D cue co-occurs)
 * 5. sculpture/object keyword               -> 3D
 * 6. panel keyword without relief cue       -> 2D, PANEL_OBJECT_3D
 * 7. nothing                                -> Indeterminate, MATERIAL_UNKNOWN
 */
export function classifyMaterial(text: string, ruleSet: RuleSet, trace: LotTrace = new LotTrace()): Classification {
  const normalized = normalizeLotText(text);

  const technique = findKeyword(normalized, ruleSet.twoDTechniques);
  const framedForRemoval = findKeyword(normalized, ruleSet.framedForRemovalCues);
  const forced = findKeyword(normalized, ruleSet.forceThreeDKeywords);
  const assemblage = findKeyword(normalized, ruleSet.assemblageKeywords);
  const object3d = findKeyword(normalized, ruleSet.threeDKeywords);

  const flat = (keyword: string, rule: ClassificationRule, label: string): Classification => {
    const competing = forced ?? assemblage ?? object3d;
    if (competing) {
      trace.note(`Reclassified to 2D: "${keyword}" takes precedence over 3D cue "${competing}"`);
    } else {
      trace.note(`Classified 2D: ${label} "${keyword}"`);
    }
    return { kind: 'TwoD', rule, keyword };
  };

  if (technique) return flat(technique, 'technique_2d', 'technique');
  if (framedForRemoval) return flat(framedForRemoval, 'framed_for_removal', 'framed for removal');

  if (forced) {
    trace.note(`Classified 3D: object keyword "${forced}"`);
    return { kind: 'ThreeD', rule: 'force_3d', keyword: forced };
  }

  const support = findKeyword(normalized, ruleSet.twoDSupports);

  if (assemblage && !support) {
    trace.note(`Classified 3D: assemblage keyword "${assemblage}"`);
    trace.raise('ASSEMBLAGE_3D_MANUAL_CHECK', `assemblage "${assemblage}": depth cannot be estimated from text`);
    return { kind: 'ThreeD', rule: 'assemblage', keyword: assemblage };
  }

  if (support) return flat(support, 'support_2d', 'support');

  if (object3d) {
    trace.note(`Classified 3D: object keyword "${object3d}"`);
    return { kind: 'ThreeD', rule: 'object_3d', keyword: object3d };
  }

  const panel = findKeyword(normalized, ruleSet.panelKeywords);
  if (panel) {
    const relief = findKeyword(normalized, ruleSet.reliefCues);
    if (!relief) {
      trace.note(`Classified 2D: panel "${panel}"`);
      trace.raise('PANEL_OBJECT_3D', `panel "${panel}" treated as flat; a measured depth is kept`);
      return { kind: 'TwoD', rule: 'panel', keyword: panel };
    }
    trace.note(`Panel "${panel}" carries relief cue "${relief}": not treated as flat`);
  }

  trace.note('No material keyword matched: MANUAL_CHECK');
  trace.raise('MATERIAL_UNKNOWN', 'no technique, object or assemblage keyword found');
  return { kind: 'Indeterminate', rule: 'no_keyword', keyword: null };
}

/**
 * Material names (English) found in the description, in rule set order,
 * deduplicated. Empty string when none.
 */
export function extractMaterials(text: string, ruleSet: RuleSet): string {
  const normalized = normalizeLotText(text);
  const found: string[] = [];
  for (const [term, name] of Object.entries(ruleSet.materials)) {
    if (found.includes(name)) continue;
    if (findKeyword(normalized, [term])) found.push(name);
  }
  return found.join(', ');
}
