/**
 * @skillmesh/cli
 *
 * Drift detection and reconciliation engine behind the `skm` command.
 */

export { loadConfig, resolveConfigPath, saveConfig } from "@/config/fs"
export { buildDefaultConfig, parseConfig } from "@/config/parse"
export { findPlatform, platformRoots } from "@/config/roots"
export type {
	LoadedConfig,
	MarketplaceConfig,
	PlatformConfig,
	SkillmeshConfig,
} from "@/config/types"
export { serializeConfig } from "@/config/write"
export { auditAll, auditSkill, summarizeAudits } from "@/drift/audit"
export { classifyDrift } from "@/drift/classify"
export type {
	AuditResultSet,
	AuditSummary,
	DriftReport,
	DriftStatus,
	ModifiedFile,
	SkillAudit,
} from "@/drift/types"
export {
	fingerprintFile,
	fingerprintMapsEqual,
	fingerprintsEqual,
	fingerprintTree,
	fingerprintTrees,
} from "@/fingerprint/hash"
export type { FileFingerprint, FingerprintMap, TreeFingerprint } from "@/fingerprint/types"
export { resolveLinkChain } from "@/platforms/links"
export { discoverSkills, inventorySkills, locateSkill } from "@/platforms/locate"
export {
	defaultPlatformRoots,
	detectPlatforms,
	getPlatformById,
	listPlatforms,
} from "@/platforms/registry"
export type {
	InstallationSnapshot,
	PlatformDefinition,
	PlatformRoot,
} from "@/platforms/types"
export { applyReconciliation } from "@/reconcile/apply"
export { planReconciliation, previewPlan, resolveConflicts } from "@/reconcile/plan"
export { reconcile, summarizeOutcomes } from "@/reconcile/reconcile"
export type {
	ConfirmFn,
	ConflictPolicy,
	OutcomeSummary,
	ReconcileAction,
	ReconcileMode,
	ReconcileOutcome,
	ReconcilePlan,
	ReconcileTarget,
} from "@/reconcile/types"
export { distributeMarketplaces, distributionStatus } from "@/sync/distribute"
export { syncAll, syncSkill } from "@/sync/sync"
export type { DistributionEntry, SkillSyncReport, SyncSummary } from "@/sync/types"
