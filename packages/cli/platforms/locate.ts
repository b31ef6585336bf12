import type { Dirent } from "node:fs"
import { readdir } from "node:fs/promises"
import path from "node:path"
import type { AbsolutePath, PlatformId, SkillName } from "@skillmesh/core"
import { coerceSkillName, readSkillManifest, SKILL_FILENAME } from "@skillmesh/core"
import { fingerprintTree } from "@/fingerprint/hash"
import type { FingerprintMap } from "@/fingerprint/types"
import { isNotFound, safeStat, toAbsolutePath } from "@/io/fs"
import type { IoResult } from "@/io/types"
import { inspectPath } from "@/platforms/links"
import type {
	InstallationSnapshot,
	InventoryEntry,
	PlatformInventory,
	PlatformRoot,
} from "@/platforms/types"
import { DEFAULT_CONCURRENCY, mapWithConcurrency } from "@/utils/concurrency"

export type SnapshotMap = Map<PlatformId, InstallationSnapshot>

export interface LocateOptions {
	concurrency?: number
}

/**
 * Snapshot `root/<skillName>` on every platform, in root order.
 *
 * Platforms without an entry at that path are omitted. A dangling link is
 * still an entry: it is reported with `exists: false` and no files.
 */
export async function locateSkill(
	skillName: SkillName,
	platformRoots: readonly PlatformRoot[],
	options: LocateOptions = {},
): Promise<IoResult<SnapshotMap>> {
	const snapshots = await mapWithConcurrency(
		platformRoots,
		options.concurrency ?? DEFAULT_CONCURRENCY,
		(root) => snapshotInstallation(root, skillName),
	)

	const located: SnapshotMap = new Map()
	for (const snapshot of snapshots) {
		if (!snapshot.ok) {
			return snapshot
		}
		if (snapshot.value && !located.has(snapshot.value.platformId)) {
			located.set(snapshot.value.platformId, snapshot.value)
		}
	}

	return { ok: true, value: located }
}

/**
 * Snapshot one installation, or null when nothing sits at its path.
 */
export async function snapshotInstallation(
	root: PlatformRoot,
	skillName: SkillName,
): Promise<IoResult<InstallationSnapshot | null>> {
	const skillPath = toAbsolutePath(path.join(root.rootPath, skillName))
	const kind = await inspectPath(skillPath)
	if (!kind.ok) {
		return kind
	}

	const base = {
		platformId: root.id,
		rootPath: root.rootPath,
		skillName,
		skillPath,
	}

	switch (kind.value.type) {
		case "missing":
			return { ok: true, value: null }
		case "symlink": {
			const { exists, target } = kind.value.link
			if (!exists) {
				return {
					ok: true,
					value: {
						...base,
						exists: false,
						files: new Map(),
						isSymlink: true,
						manifest: null,
						resolvedPath: target,
						symlinkTarget: target,
						warnings: [`${skillPath} is a dangling link to ${target}.`],
					},
				}
			}

			const content = await readInstallation(target)
			return {
				ok: true,
				value: {
					...base,
					...content,
					exists: true,
					isSymlink: true,
					resolvedPath: target,
					symlinkTarget: target,
				},
			}
		}
		case "directory": {
			const content = await readInstallation(kind.value.realPath)
			return {
				ok: true,
				value: {
					...base,
					...content,
					exists: true,
					isSymlink: false,
					resolvedPath: kind.value.realPath,
					symlinkTarget: null,
				},
			}
		}
		case "file":
		case "other":
			return {
				ok: true,
				value: {
					...base,
					exists: true,
					files: new Map(),
					isSymlink: false,
					manifest: null,
					resolvedPath: kind.value.realPath,
					symlinkTarget: null,
					warnings: [`${skillPath} is not a directory.`],
				},
			}
	}
}

async function readInstallation(resolvedPath: AbsolutePath): Promise<{
	files: FingerprintMap
	manifest: InstallationSnapshot["manifest"]
	warnings: string[]
}> {
	const stats = await safeStat(resolvedPath)
	if (!stats.ok || !stats.value?.isDirectory()) {
		return {
			files: new Map(),
			manifest: null,
			warnings: [`${resolvedPath} is not a directory.`],
		}
	}

	const tree = await fingerprintTree(resolvedPath)
	const warnings = [...tree.warnings]
	for (const linked of tree.skippedDirectoryLinks) {
		warnings.push(`Skipped linked directory ${path.join(resolvedPath, linked)}.`)
	}

	const manifest = await readSkillManifest(resolvedPath)
	if (!manifest.ok) {
		warnings.push(`Invalid ${SKILL_FILENAME} in ${resolvedPath}: ${manifest.error.message}`)
		return { files: tree.files, manifest: null, warnings }
	}

	if (!manifest.value) {
		warnings.push(`${resolvedPath} has no ${SKILL_FILENAME}.`)
		return { files: tree.files, manifest: null, warnings }
	}

	const { manifestPath: _manifestPath, ...parsed } = manifest.value
	return { files: tree.files, manifest: parsed, warnings }
}

// =============================================================================
// Discovery
// =============================================================================

/**
 * Skill directory entries of one root: directories (or links to
 * directories) that hold a SKILL.md. A missing root has none.
 */
export async function listSkillEntries(
	rootPath: AbsolutePath,
): Promise<IoResult<{ name: SkillName; skillPath: AbsolutePath; isSymlink: boolean }[]>> {
	let entries: Dirent[]
	try {
		entries = await readdir(rootPath, { withFileTypes: true })
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: [] }
		}

		return {
			error: {
				message: `Unable to list ${rootPath}.`,
				operation: "readdir",
				path: rootPath,
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}

	const skills: { name: SkillName; skillPath: AbsolutePath; isSymlink: boolean }[] = []
	for (const entry of entries) {
		if (!entry.isDirectory() && !entry.isSymbolicLink()) {
			continue
		}

		const name = coerceSkillName(entry.name)
		if (!name || name !== entry.name) {
			continue
		}

		const skillPath = toAbsolutePath(path.join(rootPath, entry.name))
		const manifestStats = await safeStat(path.join(skillPath, SKILL_FILENAME))
		if (!manifestStats.ok) {
			return manifestStats
		}
		if (!manifestStats.value?.isFile()) {
			continue
		}

		skills.push({ isSymlink: entry.isSymbolicLink(), name, skillPath })
	}

	skills.sort((a, b) => compareNames(a.name, b.name))
	return { ok: true, value: skills }
}

/**
 * Sorted, de-duplicated skill names across every root.
 */
export async function discoverSkills(
	platformRoots: readonly PlatformRoot[],
): Promise<IoResult<SkillName[]>> {
	const names = new Set<SkillName>()
	for (const root of platformRoots) {
		const entries = await listSkillEntries(root.rootPath)
		if (!entries.ok) {
			return entries
		}
		for (const entry of entries.value) {
			names.add(entry.name)
		}
	}

	return { ok: true, value: [...names].sort(compareNames) }
}

/**
 * Per-platform listing of installed skills with their manifest details.
 */
export async function inventorySkills(
	platformRoots: readonly PlatformRoot[],
): Promise<IoResult<PlatformInventory[]>> {
	const inventories: PlatformInventory[] = []

	for (const platform of platformRoots) {
		const entries = await listSkillEntries(platform.rootPath)
		if (!entries.ok) {
			return entries
		}

		const skills: InventoryEntry[] = []
		const warnings: string[] = []
		for (const entry of entries.value) {
			const kind = await inspectPath(entry.skillPath)
			if (!kind.ok) {
				return kind
			}
			const symlinkTarget = kind.value.type === "symlink" ? kind.value.link.target : null

			const manifest = await readSkillManifest(entry.skillPath)
			if (!manifest.ok || !manifest.value) {
				const reason = manifest.ok ? `missing ${SKILL_FILENAME}` : manifest.error.message
				warnings.push(`Invalid skill at ${entry.skillPath}: ${reason}`)
				skills.push({
					description: null,
					directoryName: entry.name,
					isSymlink: entry.isSymlink,
					name: entry.name,
					skillPath: entry.skillPath,
					symlinkTarget,
					valid: false,
				})
				continue
			}

			skills.push({
				description: manifest.value.description ?? null,
				directoryName: entry.name,
				isSymlink: entry.isSymlink,
				name: manifest.value.name,
				skillPath: entry.skillPath,
				symlinkTarget,
				valid: true,
			})
		}

		inventories.push({ platform, skills, warnings })
	}

	return { ok: true, value: inventories }
}

function compareNames(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0
}
