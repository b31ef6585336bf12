import type { IoError, NotFoundError, Result, SkillName } from "@skillmesh/core"
import { classifyDrift } from "@/drift/classify"
import type { AuditResultSet, AuditSummary, SkillAudit } from "@/drift/types"
import { discoverSkills, type LocateOptions, locateSkill } from "@/platforms/locate"
import type { PlatformRoot } from "@/platforms/types"

export type AuditError = NotFoundError | IoError

/**
 * Locate and classify one skill. Fails when no platform has it.
 */
export async function auditSkill(
	skillName: SkillName,
	platformRoots: readonly PlatformRoot[],
	options: LocateOptions = {},
): Promise<Result<SkillAudit, AuditError>> {
	const located = await locateSkill(skillName, platformRoots, options)
	if (!located.ok) {
		return located
	}

	if (located.value.size === 0) {
		return {
			error: {
				message: `Skill "${skillName}" was not found on any platform.`,
				target: "skill",
				type: "not_found",
			},
			ok: false,
		}
	}

	const snapshots = [...located.value.values()]
	return {
		ok: true,
		value: {
			report: classifyDrift(located.value),
			skillName,
			snapshots,
			warnings: snapshots.flatMap((snapshot) => snapshot.warnings),
		},
	}
}

/**
 * Audit every skill discovered on any platform, in name order.
 */
export async function auditAll(
	platformRoots: readonly PlatformRoot[],
	options: LocateOptions = {},
): Promise<Result<AuditResultSet, AuditError>> {
	const names = await discoverSkills(platformRoots)
	if (!names.ok) {
		return names
	}

	const audits: SkillAudit[] = []
	for (const name of names.value) {
		const audit = await auditSkill(name, platformRoots, options)
		if (!audit.ok) {
			return audit
		}
		audits.push(audit.value)
	}

	return { ok: true, value: { audits, summary: summarizeAudits(audits) } }
}

export function summarizeAudits(audits: readonly SkillAudit[]): AuditSummary {
	const summary: AuditSummary = { drift: 0, ok: 0, single: 0, synced: 0, total: 0 }
	for (const audit of audits) {
		summary.total += 1
		summary[audit.report.status] += 1
	}
	return summary
}
