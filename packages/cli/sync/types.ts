import type { AbsolutePath, PlatformId, Result, SkillName } from "@skillmesh/core"
import type {
	ConfirmFn,
	ConflictPolicy,
	OutcomeSummary,
	ReconcileMode,
	ReconcileOutcome,
} from "@/reconcile/types"
import type { SkmError } from "@/types/errors"

export type SyncStage = "validate" | "discover" | "snapshot" | "targets" | "reconcile"

export type SyncError = SkmError & { stage: SyncStage }

export type SyncResult<T> = Result<T, SyncError>

export interface SyncOptions {
	onConflict: ConflictPolicy
	dryRun: boolean
	/** Overrides the configured sync mode. */
	mode?: ReconcileMode
	/** Target platform ids, or `all` or `auto` alone; defaults to every enabled platform. */
	to?: string[]
	confirm?: ConfirmFn
}

export interface SyncAllOptions extends SyncOptions {
	/** Overrides the configured source platform. */
	from?: string
}

export interface SkillSyncReport {
	skillName: SkillName
	sourcePath: AbsolutePath
	sourcePlatform: PlatformId | null
	mode: ReconcileMode
	outcomes: ReconcileOutcome[]
	warnings: string[]
}

export interface SyncSummary {
	dryRun: boolean
	skills: SkillSyncReport[]
	totals: OutcomeSummary
	noOpReason?: "no-skills" | "no-targets"
	/** Platforms left out because they read marketplaces natively. */
	excludedPlatforms?: PlatformId[]
}

export type DistributionState = "linked" | "linked_elsewhere" | "exists" | "absent"

export interface MarketplaceSkill {
	marketplace: string
	skillName: SkillName
	skillPath: AbsolutePath
	/** From the SKILL.md frontmatter; null when absent or unreadable. */
	description: string | null
}

export interface DistributionEntry extends MarketplaceSkill {
	platformId: PlatformId
	targetPath: AbsolutePath
	state: DistributionState
	/** Where the existing link points, for linked states. */
	linkTarget: AbsolutePath | null
}
