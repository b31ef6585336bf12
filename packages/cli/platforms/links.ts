import path from "node:path"
import type { AbsolutePath } from "@skillmesh/core"
import { readLink, safeLstat, safeRealpath, toAbsolutePath } from "@/io/fs"
import type { IoResult } from "@/io/types"

const MAX_LINK_HOPS = 40

export interface LinkResolution {
	target: AbsolutePath
	exists: boolean
}

export type PathKind =
	| { type: "missing" }
	| { type: "symlink"; link: LinkResolution }
	| { type: "directory"; realPath: AbsolutePath }
	| { type: "file"; realPath: AbsolutePath }
	| { type: "other"; realPath: AbsolutePath }

/**
 * Follow a link chain to its end without requiring the end to exist.
 *
 * An intact chain resolves to the real path of its final target. A dangling
 * chain resolves to the first path in it that does not exist.
 */
export async function resolveLinkChain(linkPath: string): Promise<IoResult<LinkResolution>> {
	const real = await safeRealpath(linkPath)
	if (real.ok && real.value) {
		return { ok: true, value: { exists: true, target: real.value } }
	}

	let current = toAbsolutePath(linkPath)
	for (let hop = 0; hop < MAX_LINK_HOPS; hop += 1) {
		const stats = await safeLstat(current)
		if (!stats.ok) {
			return stats
		}

		if (!stats.value) {
			return { ok: true, value: { exists: false, target: current } }
		}

		if (!stats.value.isSymbolicLink()) {
			// The chain ends at an entry whose parent directories did not resolve.
			return { ok: true, value: { exists: false, target: current } }
		}

		const next = await readLink(current)
		if (!next.ok) {
			return next
		}

		current = toAbsolutePath(path.resolve(path.dirname(current), next.value))
	}

	// Link loop: report where the walk stopped.
	return { ok: true, value: { exists: false, target: current } }
}

/**
 * Classify what sits at `targetPath` without following a link there.
 */
export async function inspectPath(targetPath: string): Promise<IoResult<PathKind>> {
	const stats = await safeLstat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (!stats.value) {
		return { ok: true, value: { type: "missing" } }
	}

	if (stats.value.isSymbolicLink()) {
		const link = await resolveLinkChain(targetPath)
		if (!link.ok) {
			return link
		}
		return { ok: true, value: { link: link.value, type: "symlink" } }
	}

	const real = await safeRealpath(targetPath)
	if (!real.ok) {
		return real
	}
	const realPath = real.value ?? toAbsolutePath(targetPath)

	if (stats.value.isDirectory()) {
		return { ok: true, value: { realPath, type: "directory" } }
	}

	if (stats.value.isFile()) {
		return { ok: true, value: { realPath, type: "file" } }
	}

	return { ok: true, value: { realPath, type: "other" } }
}
