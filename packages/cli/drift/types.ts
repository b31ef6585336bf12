import type { AbsolutePath, PlatformId, SkillName } from "@skillmesh/core"
import type { InstallationSnapshot } from "@/platforms/types"

export type DriftStatus = "single" | "synced" | "drift" | "ok"

export interface ModifiedFile {
	relativePath: string
	baselineHash: string
	otherHash: string
}

/**
 * Outcome of comparing every installation of one skill.
 *
 * File lists are keyed by platform id and relative to `baseline`; only
 * platforms with at least one entry appear. Any dangling link makes the
 * report `drift`.
 */
export interface DriftReport {
	status: DriftStatus
	platforms: PlatformId[]
	baseline: PlatformId | null
	missingFiles: Record<string, string[]>
	extraFiles: Record<string, string[]>
	modifiedFiles: Record<string, ModifiedFile[]>
	/** Platforms whose installation is a link to a path that no longer exists. */
	danglingLinks: PlatformId[]
	symlinkConvergence: { target: AbsolutePath } | null
}

export interface SkillAudit {
	skillName: SkillName
	report: DriftReport
	snapshots: InstallationSnapshot[]
	warnings: string[]
}

export interface AuditSummary {
	total: number
	single: number
	synced: number
	ok: number
	drift: number
}

export interface AuditResultSet {
	audits: SkillAudit[]
	summary: AuditSummary
}
