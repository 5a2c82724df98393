/**
 * Memory modules export
 */

export { MemoryStore } from './memory-store';
export type { MemoryHit, RecallOptions, RecordInput } from './memory-store';
export { ConsolidationJob, summarize } from './consolidation';
export type { ConsolidationReport, Distiller, NodeInfo, NodeResolver } from './consolidation';
export { fingerprint, goalTokens, tokenSimilarity } from './fingerprint';
