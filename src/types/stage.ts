/**
 * Options every pipeline stage accepts.
 */

import type { Logger } from "../logging/logger.js";
import type { PipelineWarning } from "./findings.js";

export type WarningHandler = (warning: PipelineWarning) => void;

export interface StageOptions {
  /** Stage logger; a silent logger when omitted */
  logger?: Logger;
  /** Receives each recovered defect */
  onWarning?: WarningHandler;
}
