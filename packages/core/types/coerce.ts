import path from "node:path"
import type { AbsolutePath, PlatformId, SkillName } from "@core/types/branded"

const PLATFORM_ID_PATTERN = /^[a-z0-9][a-z0-9_-]*$/

export function coercePlatformId(value: string): PlatformId | null {
	const trimmed = value.trim().toLowerCase()
	if (!PLATFORM_ID_PATTERN.test(trimmed)) return null
	return trimmed as PlatformId
}

export function assertPlatformId(value: string): PlatformId {
	const result = coercePlatformId(value)
	if (!result) {
		throw new Error(`Expected platform id, got: ${value}`)
	}
	return result
}

export function coerceSkillName(value: string): SkillName | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null
	if (trimmed.includes("/") || trimmed.includes("\\")) return null
	if (trimmed === "." || trimmed === "..") return null
	return trimmed as SkillName
}

export function coerceAbsolutePath(
	value: string,
	basePath?: string,
): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed.length === 0) return null

	let resolved: string
	if (path.isAbsolute(trimmed)) {
		resolved = path.normalize(trimmed)
	} else if (basePath) {
		resolved = path.resolve(basePath, trimmed)
	} else {
		return null
	}

	return resolved as AbsolutePath
}

/**
 * Expand a leading `~/` against the given home directory, then resolve the
 * result against `basePath`.
 */
export function expandHomePath(
	value: string,
	homeDir: string,
	basePath?: string,
): AbsolutePath | null {
	const trimmed = value.trim()
	if (trimmed === "~") {
		return coerceAbsolutePath(homeDir)
	}
	if (trimmed.startsWith("~/")) {
		return coerceAbsolutePath(path.join(homeDir, trimmed.slice(2)))
	}
	return coerceAbsolutePath(trimmed, basePath)
}
