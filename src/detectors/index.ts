export { BaseDetector, type IncidentDraft } from './base.js';
export { ActionLoopDetector, type ActionHistory, type ActionLoopOptions } from './action-loop.js';
export {
  GoalDriftDetector,
  extractOutputText,
  type EmbedFunction,
  type GoalDriftOptions,
  type SimilarityObserver,
} from './goal-drift.js';
export { ResourceSpikeDetector, type ResourceSpikeOptions, type RunCounter } from './resource-spike.js';
export { cosineSimilarity } from './similarity.js';
