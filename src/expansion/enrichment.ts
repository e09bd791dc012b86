/**
 * Per-item enrichment: learning objectives and question types.
 */

import type { DisciplineProfile } from "../config/discipline/schema.js";
import type { QuestionType } from "../config/discipline/enums.js";

/**
 * Question types whose keywords the title contains, in rule order, or the
 * fallback type when none match.
 */
export function questionTypesFor(
  title: string,
  profile: Pick<DisciplineProfile, "questionTypeRules" | "fallbackQuestionType">
): QuestionType[] {
  const lowered = title.toLowerCase();
  const types: QuestionType[] = [];
  for (const rule of profile.questionTypeRules) {
    if (!types.includes(rule.type) && rule.keywords.some((k) => lowered.includes(k))) {
      types.push(rule.type);
    }
  }
  return types.length > 0 ? types : [profile.fallbackQuestionType];
}

export function learningObjectivesFor(
  title: string,
  profile: Pick<DisciplineProfile, "learningObjectiveTemplates" | "discipline">
): string[] {
  const topic = title.toLowerCase();
  const discipline = profile.discipline.toLowerCase();
  return profile.learningObjectiveTemplates.map((template) =>
    template.split("{topic}").join(topic).split("{discipline}").join(discipline)
  );
}
