/**
 * Discipline profile module.
 *
 * Provides schema-validated, immutable per-discipline heuristic tables.
 *
 * Usage:
 *   import { loadBuiltinProfile, loadDisciplineProfile } from "./config/discipline/index.js";
 *
 *   const physics = loadBuiltinProfile("physics");
 *   const custom = loadDisciplineProfile({ ...DEFAULT_PROFILE, slug: "astro" });
 */

export {
  EducationalTier,
  CognitiveLevel,
  EdgeProvenance,
  QuestionType,
  TIER_ORDER,
  PROVENANCE_PRECEDENCE,
  tierRank,
  compareTiers,
  laterTier,
  earlierTier,
} from "./enums.js";

export type {
  DisciplineProfile,
  DisciplineProfileInput,
  ContentArea,
  QuestionTypeRule,
} from "./schema.js";

export {
  DisciplineProfileSchema,
  ContentAreaSchema,
  QuestionTypeRuleSchema,
  generalClusterLabel,
} from "./schema.js";

export {
  loadDisciplineProfile,
  validateDisciplineProfile,
  deepFreeze,
  formatZodIssues,
  DisciplineProfileError,
  type ProfileValidationIssue,
} from "./loader.js";

export {
  BUILTIN_PROFILE_DIR,
  listBuiltinProfiles,
  loadBuiltinProfile,
  loadDisciplineProfileFile,
} from "./builtin.js";

export {
  DEFAULT_PROFILE,
  DEFAULT_QUESTION_TYPE_RULES,
  DEFAULT_LEARNING_OBJECTIVE_TEMPLATES,
  GENERIC_PROGRESSION_LADDERS,
  STOP_WORDS,
} from "./defaults.js";
