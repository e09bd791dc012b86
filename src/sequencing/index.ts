/**
 * Level-Aware Sequencer.
 */

export {
  sequence,
  promoteTiers,
  topologicalOrder,
  type SequenceNode,
  type SequenceResult,
  type SequenceOptions,
} from "./sequencer.js";
