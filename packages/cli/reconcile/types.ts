import type { AbsolutePath, PlatformId } from "@skillmesh/core"
import type { InstallationSnapshot } from "@/platforms/types"

export type ReconcileMode = "link" | "copy"

export type ConflictPolicy = "ask" | "force" | "skip"

export type ReconcileAction =
	| "linked"
	| "copied"
	| "already_correct"
	| "skipped_existing"
	| "skipped_declined"
	| "failed"

/** What a replacement removed from the target path. */
export type ExistingKind = "symlink" | "directory" | "file"

export interface ReconcileTarget {
	platformId: PlatformId
	rootPath: AbsolutePath
}

export interface ReconcileOutcome {
	platformId: PlatformId
	targetPath: AbsolutePath
	action: ReconcileAction
	detail: string
	dryRun: boolean
	replaced?: ExistingKind
}

interface TaskBase {
	platformId: PlatformId
	rootPath: AbsolutePath
	targetPath: AbsolutePath
}

export type ReconcileTask =
	| (TaskBase & { kind: "create" })
	| (TaskBase & { kind: "replace"; existing: ExistingKind })
	| (TaskBase & { kind: "confirm"; existing: ExistingKind })
	| (TaskBase & { kind: "already_correct"; detail: string })
	| (TaskBase & {
			kind: "skip"
			action: "skipped_existing" | "skipped_declined"
			detail: string
	  })
	| (TaskBase & { kind: "fail"; detail: string })

export interface ReconcilePlan {
	source: InstallationSnapshot
	mode: ReconcileMode
	tasks: ReconcileTask[]
}

export type ConfirmFn = (message: string) => Promise<boolean>

export interface PlanOptions {
	mode: ReconcileMode
	onConflict: ConflictPolicy
}

export interface ReconcileOptions extends PlanOptions {
	dryRun?: boolean
	/** Resolves `ask` conflicts; without it an `ask` conflict fails the run. */
	confirm?: ConfirmFn
}

export interface OutcomeSummary {
	total: number
	linked: number
	copied: number
	alreadyCorrect: number
	skippedExisting: number
	skippedDeclined: number
	failed: number
	/** 1 when any target failed, 2 when nothing succeeded but something was skipped. */
	exitCode: 0 | 1 | 2
}
