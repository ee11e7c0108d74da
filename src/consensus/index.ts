/**
 * Consensus Module
 *
 * Multi-model quality voting: runs the same document through several models
 * and only acts on a strict majority of parseable answers.
 */

export { EnsembleEvaluator, computeConsensus } from './EnsembleEvaluator.js';
export type { EnsembleResult, EnsembleConfig } from './EnsembleEvaluator.js';
