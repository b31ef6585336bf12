/**
 * In-memory installation snapshots for classifier tests.
 */

import type { PlatformId } from "@skillmesh/core"
import type { FingerprintMap } from "@/fingerprint/types"
import type { InstallationSnapshot } from "@/platforms/types"
import { abs, pid, skill } from "@/tests/helpers/branded"

/**
 * Build a fingerprint map from `relativePath -> contentHash`.
 * Sizes are derived from the hash so equal hashes get equal sizes.
 */
export function fingerprints(entries: Record<string, string>): FingerprintMap {
	const map: FingerprintMap = new Map()
	for (const [relativePath, contentHash] of Object.entries(entries)) {
		map.set(relativePath, { contentHash, relativePath, sizeBytes: contentHash.length })
	}
	return map
}

interface SnapshotInput {
	platformId: string
	files?: Record<string, string>
	/** Link target; makes the snapshot a link. */
	linkTo?: string
	/** Real path of a non-link installation. */
	realPath?: string
	exists?: boolean
}

export function makeSnapshot(input: SnapshotInput): InstallationSnapshot {
	const rootPath = abs(`/home/test/.${input.platformId}/skills`)
	const skillPath = abs(`${rootPath}/demo`)
	const target = input.linkTo ? abs(input.linkTo) : null

	return {
		exists: input.exists ?? true,
		files: fingerprints(input.files ?? {}),
		isSymlink: target !== null,
		manifest: null,
		platformId: pid(input.platformId),
		resolvedPath: target ?? abs(input.realPath ?? skillPath),
		rootPath,
		skillName: skill("demo"),
		skillPath,
		symlinkTarget: target,
		warnings: [],
	}
}

/**
 * Ordered snapshot map, keyed by platform id in argument order.
 */
export function snapshotMap(
	...snapshots: InstallationSnapshot[]
): Map<PlatformId, InstallationSnapshot> {
	return new Map(snapshots.map((snapshot) => [snapshot.platformId, snapshot]))
}
