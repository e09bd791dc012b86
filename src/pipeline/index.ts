/**
 * Curriculum pipeline exports.
 */

export {
  CurriculumAssembler,
  assembleCurriculum,
  type AssemblerOptions,
  type AssemblyStats,
  type CurriculumAssembly,
} from "./assembler.js";
