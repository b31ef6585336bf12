import path from "node:path"
import type { AbsolutePath, PlatformId, SkillName } from "@skillmesh/core"
import { coerceSkillName, SKILL_FILENAME } from "@skillmesh/core"
import { findPlatform } from "@/config/roots"
import type { PlatformConfig, SkillmeshConfig } from "@/config/types"
import { safeRealpath, safeStat, toAbsolutePath } from "@/io/fs"
import { listSkillEntries, snapshotInstallation } from "@/platforms/locate"
import { EXTERNAL_PLATFORM_ID } from "@/platforms/registry"
import { reconcile, summarizeOutcomes } from "@/reconcile/reconcile"
import type { ReconcileTarget } from "@/reconcile/types"
import { failSync, syncValidation } from "@/sync/errors"
import { resolveTargetPlatforms } from "@/sync/targets"
import type {
	SkillSyncReport,
	SyncAllOptions,
	SyncOptions,
	SyncResult,
	SyncSummary,
} from "@/sync/types"

/**
 * Reconcile one skill directory onto every enabled platform except the
 * one it lives in.
 */
export async function syncSkill(
	skillPath: string,
	config: SkillmeshConfig,
	options: SyncOptions,
): Promise<SyncResult<SkillSyncReport>> {
	const source = await validateSource(skillPath)
	if (!source.ok) {
		return source
	}

	const { skillDir, skillName } = source.value
	const rootPath = toAbsolutePath(path.dirname(skillDir))
	const owner = await findOwningPlatform(config, rootPath)
	if (!owner.ok) {
		return owner
	}

	const snapshot = await snapshotInstallation(
		{
			displayName: owner.value?.displayName ?? "External",
			id: owner.value?.id ?? EXTERNAL_PLATFORM_ID,
			rootPath,
		},
		skillName,
	)
	if (!snapshot.ok) {
		return failSync("snapshot", snapshot.error)
	}
	if (!snapshot.value || !snapshot.value.exists) {
		return {
			error: {
				message: `Skill source ${skillDir} disappeared.`,
				path: skillDir,
				stage: "snapshot",
				target: "skill",
				type: "not_found",
			},
			ok: false,
		}
	}

	const targets = await selectTargets(config, owner.value?.id ?? null, options.to)
	if (!targets.ok) {
		return targets
	}

	const mode = options.mode ?? config.syncMode
	const outcomes = await reconcile(snapshot.value, targets.value, {
		confirm: options.confirm,
		dryRun: options.dryRun,
		mode,
		onConflict: options.onConflict,
	})
	if (!outcomes.ok) {
		return { error: { ...outcomes.error, stage: "reconcile" }, ok: false }
	}

	return {
		ok: true,
		value: {
			mode,
			outcomes: outcomes.value,
			skillName,
			sourcePath: snapshot.value.resolvedPath,
			sourcePlatform: owner.value?.id ?? null,
			warnings: snapshot.value.warnings,
		},
	}
}

/**
 * Reconcile every skill of the source platform, one skill at a time.
 */
export async function syncAll(
	config: SkillmeshConfig,
	options: SyncAllOptions,
): Promise<SyncResult<SyncSummary>> {
	const sourceId = options.from ?? config.source
	if (!sourceId) {
		return syncValidation(
			"validate",
			"source",
			"No source platform configured. Set `source` in the config or pass --from.",
		)
	}

	const sourcePlatform = findPlatform(config, sourceId)
	if (!sourcePlatform) {
		return syncValidation("validate", "source", `Unknown source platform "${sourceId}".`)
	}

	const entries = await listSkillEntries(sourcePlatform.rootPath)
	if (!entries.ok) {
		return failSync("discover", entries.error)
	}

	const skills: SkillSyncReport[] = []
	for (const entry of entries.value) {
		// Links in the source root point at skills owned elsewhere.
		if (entry.isSymlink) {
			continue
		}

		const report = await syncSkill(entry.skillPath, config, options)
		if (!report.ok) {
			return report
		}
		skills.push(report.value)
	}

	const summary: SyncSummary = {
		dryRun: options.dryRun,
		skills,
		totals: summarizeOutcomes(skills.flatMap((skill) => skill.outcomes)),
	}
	if (skills.length === 0) {
		summary.noOpReason = "no-skills"
	} else if (summary.totals.total === 0) {
		summary.noOpReason = "no-targets"
	}

	return { ok: true, value: summary }
}

async function validateSource(
	skillPath: string,
): Promise<SyncResult<{ skillDir: AbsolutePath; skillName: SkillName }>> {
	const skillDir = toAbsolutePath(skillPath)
	const stats = await safeStat(skillDir)
	if (!stats.ok) {
		return failSync("validate", stats.error)
	}

	if (!stats.value) {
		return {
			error: {
				message: `Skill directory not found: ${skillDir}`,
				path: skillDir,
				stage: "validate",
				target: "skill",
				type: "not_found",
			},
			ok: false,
		}
	}

	if (!stats.value.isDirectory()) {
		return syncValidation("validate", "skillPath", `Not a directory: ${skillDir}`)
	}

	const manifest = await safeStat(path.join(skillDir, SKILL_FILENAME))
	if (!manifest.ok) {
		return failSync("validate", manifest.error)
	}
	if (!manifest.value?.isFile()) {
		return syncValidation("validate", "skillPath", `No ${SKILL_FILENAME} in ${skillDir}`)
	}

	const directoryName = path.basename(skillDir)
	const skillName = coerceSkillName(directoryName)
	if (!skillName || skillName !== directoryName) {
		return syncValidation("validate", "skillPath", `Invalid skill directory name: ${skillDir}`)
	}

	return { ok: true, value: { skillDir, skillName } }
}

/**
 * The configured platform whose root holds the skill, compared by real path.
 */
async function findOwningPlatform(
	config: SkillmeshConfig,
	rootPath: AbsolutePath,
): Promise<SyncResult<PlatformConfig | null>> {
	const realRoot = await safeRealpath(rootPath)
	if (!realRoot.ok) {
		return failSync("validate", realRoot.error)
	}

	for (const platform of config.platforms) {
		if (platform.rootPath === rootPath) {
			return { ok: true, value: platform }
		}

		const realPlatformRoot = await safeRealpath(platform.rootPath)
		if (!realPlatformRoot.ok) {
			return failSync("validate", realPlatformRoot.error)
		}
		if (realPlatformRoot.value && realPlatformRoot.value === realRoot.value) {
			return { ok: true, value: platform }
		}
	}

	return { ok: true, value: null }
}

async function selectTargets(
	config: SkillmeshConfig,
	ownerId: PlatformId | null,
	requested: string[] | undefined,
): Promise<SyncResult<ReconcileTarget[]>> {
	const platforms = await resolveTargetPlatforms(config, requested)
	if (!platforms.ok) {
		return platforms
	}

	return {
		ok: true,
		value: platforms.value
			.filter((platform) => platform.id !== ownerId)
			.map((platform) => ({ platformId: platform.id, rootPath: platform.rootPath })),
	}
}
