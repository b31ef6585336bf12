import path from "node:path"
import type { PlatformId } from "@skillmesh/core"
import { MARKETPLACE_SKILLS_DIR, readSkillManifest } from "@skillmesh/core"
import { platformRoots } from "@/config/roots"
import type { MarketplaceConfig, SkillmeshConfig } from "@/config/types"
import { safeRealpath, toAbsolutePath } from "@/io/fs"
import { inspectPath } from "@/platforms/links"
import { listSkillEntries, snapshotInstallation } from "@/platforms/locate"
import { EXTERNAL_PLATFORM_ID, readsMarketplacesNatively } from "@/platforms/registry"
import { reconcile, summarizeOutcomes } from "@/reconcile/reconcile"
import type { ReconcileTarget } from "@/reconcile/types"
import { failSync } from "@/sync/errors"
import { resolveTargetPlatforms } from "@/sync/targets"
import type {
	DistributionEntry,
	MarketplaceSkill,
	SkillSyncReport,
	SyncOptions,
	SyncResult,
	SyncSummary,
} from "@/sync/types"

export interface MarketplaceFilter {
	/** Limit to one configured marketplace. */
	marketplace?: string
	/** Also cover platforms that read marketplaces natively. */
	includeNative?: boolean
}

export interface DistributeOptions extends Omit<SyncOptions, "mode">, MarketplaceFilter {
	/** Only distribute the skill with this directory name. */
	skill?: string
}

/**
 * Skills under `<marketplace>/skills`, sorted by name.
 */
export async function discoverMarketplaceSkills(
	marketplace: MarketplaceConfig,
): Promise<SyncResult<MarketplaceSkill[]>> {
	const skillsRoot = toAbsolutePath(path.join(marketplace.path, MARKETPLACE_SKILLS_DIR))
	const entries = await listSkillEntries(skillsRoot)
	if (!entries.ok) {
		return failSync("discover", entries.error)
	}

	const skills: MarketplaceSkill[] = []
	for (const entry of entries.value) {
		const manifest = await readSkillManifest(entry.skillPath)
		if (!manifest.ok && manifest.error.type === "io") {
			return failSync("discover", manifest.error)
		}

		skills.push({
			description: manifest.ok ? (manifest.value?.description ?? null) : null,
			marketplace: marketplace.name,
			skillName: entry.name,
			skillPath: entry.skillPath,
		})
	}

	return { ok: true, value: skills }
}

/**
 * Every skill of the selected marketplaces, in config order.
 */
export async function listMarketplaceSkills(
	config: SkillmeshConfig,
	options: Pick<MarketplaceFilter, "marketplace"> = {},
): Promise<SyncResult<MarketplaceSkill[]>> {
	const marketplaces = selectMarketplaces(config, options.marketplace)
	if (!marketplaces.ok) {
		return marketplaces
	}

	const skills: MarketplaceSkill[] = []
	for (const marketplace of marketplaces.value) {
		const found = await discoverMarketplaceSkills(marketplace)
		if (!found.ok) {
			return found
		}
		skills.push(...found.value)
	}

	return { ok: true, value: skills }
}

/**
 * How every marketplace skill is installed on every enabled platform,
 * leaving out native marketplace readers unless `includeNative` is set.
 */
export async function distributionStatus(
	config: SkillmeshConfig,
	options: MarketplaceFilter = {},
): Promise<SyncResult<DistributionEntry[]>> {
	const skills = await listMarketplaceSkills(config, options)
	if (!skills.ok) {
		return skills
	}

	const roots = platformRoots(config).filter(
		(root) => options.includeNative || !readsMarketplacesNatively(root.id),
	)

	const entries: DistributionEntry[] = []
	for (const skill of skills.value) {
		const realSkill = await safeRealpath(skill.skillPath)
		if (!realSkill.ok) {
			return failSync("discover", realSkill.error)
		}
		const expectedTarget = realSkill.value ?? skill.skillPath

		for (const root of roots) {
			const targetPath = toAbsolutePath(path.join(root.rootPath, skill.skillName))
			const kind = await inspectPath(targetPath)
			if (!kind.ok) {
				return failSync("discover", kind.error)
			}

			const base = { ...skill, platformId: root.id, targetPath }
			switch (kind.value.type) {
				case "missing":
					entries.push({ ...base, linkTarget: null, state: "absent" })
					break
				case "symlink": {
					const { link } = kind.value
					const linked = link.exists && link.target === expectedTarget
					entries.push({
						...base,
						linkTarget: link.target,
						state: linked ? "linked" : "linked_elsewhere",
					})
					break
				}
				default:
					entries.push({ ...base, linkTarget: null, state: "exists" })
			}
		}
	}

	return { ok: true, value: entries }
}

/**
 * Link marketplace skills into the target platforms.
 *
 * Platforms that read marketplaces natively are left out unless
 * `includeNative` is set, even when `to` names them.
 */
export async function distributeMarketplaces(
	config: SkillmeshConfig,
	options: DistributeOptions,
): Promise<SyncResult<SyncSummary>> {
	const listed = await listMarketplaceSkills(config, options)
	if (!listed.ok) {
		return listed
	}

	let selected = listed.value
	if (options.skill !== undefined) {
		selected = selected.filter((skill) => skill.skillName === options.skill)
		if (selected.length === 0) {
			return {
				error: {
					message: `Skill "${options.skill}" was not found in any marketplace.`,
					stage: "discover",
					target: "skill",
					type: "not_found",
				},
				ok: false,
			}
		}
	}

	const platforms = await resolveTargetPlatforms(config, options.to)
	if (!platforms.ok) {
		return platforms
	}

	const targets: ReconcileTarget[] = []
	const excludedPlatforms: PlatformId[] = []
	for (const platform of platforms.value) {
		if (!options.includeNative && readsMarketplacesNatively(platform.id)) {
			excludedPlatforms.push(platform.id)
			continue
		}
		targets.push({ platformId: platform.id, rootPath: platform.rootPath })
	}

	const skills: SkillSyncReport[] = []
	for (const skill of selected) {
		const snapshot = await snapshotInstallation(
			{
				displayName: skill.marketplace,
				id: EXTERNAL_PLATFORM_ID,
				rootPath: toAbsolutePath(path.dirname(skill.skillPath)),
			},
			skill.skillName,
		)
		if (!snapshot.ok) {
			return failSync("snapshot", snapshot.error)
		}
		if (!snapshot.value) {
			continue
		}

		const outcomes = await reconcile(snapshot.value, targets, {
			confirm: options.confirm,
			dryRun: options.dryRun,
			mode: "link",
			onConflict: options.onConflict,
		})
		if (!outcomes.ok) {
			return { error: { ...outcomes.error, stage: "reconcile" }, ok: false }
		}

		skills.push({
			mode: "link",
			outcomes: outcomes.value,
			skillName: skill.skillName,
			sourcePath: snapshot.value.resolvedPath,
			sourcePlatform: null,
			warnings: snapshot.value.warnings,
		})
	}

	const summary: SyncSummary = {
		dryRun: options.dryRun,
		excludedPlatforms,
		skills,
		totals: summarizeOutcomes(skills.flatMap((skill) => skill.outcomes)),
	}
	if (skills.length === 0) {
		summary.noOpReason = "no-skills"
	} else if (targets.length === 0) {
		summary.noOpReason = "no-targets"
	}

	return { ok: true, value: summary }
}

function selectMarketplaces(
	config: SkillmeshConfig,
	name: string | undefined,
): SyncResult<MarketplaceConfig[]> {
	if (!name) {
		return { ok: true, value: config.marketplaces }
	}

	const marketplace = config.marketplaces.find((entry) => entry.name === name)
	if (!marketplace) {
		return {
			error: {
				message: `Unknown marketplace "${name}".`,
				stage: "validate",
				target: "marketplace",
				type: "not_found",
			},
			ok: false,
		}
	}

	return { ok: true, value: [marketplace] }
}
