// 공개 API: reconcileAll, applyReconciliation, rollbackTo, listBackups 위에 CLI/MCP가 올라갑니다.

export { reconcileAll, classify, summarizeActions, isUpToDate, generateDiff } from './reconcile-engine.js';
export { applyReconciliation, rollbackTo } from './apply-coordinator.js';
export { listBackups, findBackup, createBackup, restoreBackup, pruneBackups, selectPrunable } from './backup-manager.js';
export { loadManifest, createManifest, saveManifest, updateHashes } from './state-store.js';
export { normalizedHash, normalizeContent, hashesEqual, fileHash } from './fingerprint.js';
export { buildConflictBlock, hasConflictMarkers } from './conflict-markers.js';
export { DirectoryUpstreamProvider, resolveTargetVersion } from './upstream.js';
export { loadConfig } from './config.js';
export { planSync, executePlan, needsApply, rescan, inspectProject, UNSYNCED_VERSION } from './sync-session.js';
export * from './errors.js';

export type { FileAction, FileState, ReconcileResult, ActionSummary } from '../types/common.js';
export type { Manifest, TrackedFile } from '../types/manifest.js';
export type { Backup, PruneOptions, PruneResult } from '../types/backup.js';
export type { ApplyOptions, ApplyOutcome, ApplyPhase, FileOps } from '../types/apply.js';
export type { UpstreamProvider, UpstreamRelease, UpstreamContents } from '../types/upstream.js';
export type { StencilConfig } from '../types/config.js';
