import path from "node:path"
import { assertPlatformId, expandHomePath, isPlatformId } from "@skillmesh/core"
import type { AbsolutePath, PlatformId } from "@skillmesh/core"
import { safeStat } from "@/io/fs"
import type { IoResult } from "@/io/types"
import type { PlatformDefinition, PlatformDetection, PlatformRoot } from "@/platforms/types"

// =============================================================================
// Built-in Platforms
// =============================================================================

interface PlatformEntry {
	id: string
	displayName: string
	baseDir: string
	nativeMarketplace?: boolean
}

const PLATFORM_ENTRIES: PlatformEntry[] = [
	{ baseDir: ".claude", displayName: "Claude Code", id: "claude", nativeMarketplace: true },
	{ baseDir: ".codex", displayName: "Codex", id: "codex" },
	{ baseDir: ".gemini", displayName: "Gemini CLI", id: "gemini" },
	{ baseDir: ".copilot", displayName: "GitHub Copilot", id: "copilot" },
]

/** Platform id given to installations outside every configured root. */
export const EXTERNAL_PLATFORM_ID: PlatformId = assertPlatformId("external")

const PLATFORM_REGISTRY: PlatformDefinition[] = PLATFORM_ENTRIES.flatMap((entry) =>
	isPlatformId(entry.id)
		? [
				{
					detectPath: `~/${entry.baseDir}`,
					displayName: entry.displayName,
					id: entry.id,
					nativeMarketplace: entry.nativeMarketplace ?? false,
					skillsPath: `~/${path.posix.join(entry.baseDir, "skills")}`,
				},
			]
		: [],
)

export function listPlatforms(): PlatformDefinition[] {
	return [...PLATFORM_REGISTRY]
}

export function getPlatformById(platformId: string): PlatformDefinition | undefined {
	return PLATFORM_REGISTRY.find((entry) => entry.id === platformId)
}

export function platformDisplayName(platformId: PlatformId): string {
	return getPlatformById(platformId)?.displayName ?? platformId
}

/** Configured platforms that are not built in never read marketplaces natively. */
export function readsMarketplacesNatively(platformId: PlatformId): boolean {
	return getPlatformById(platformId)?.nativeMarketplace ?? false
}

/**
 * Roots for the built-in platforms at their default locations, in registry order.
 */
export function defaultPlatformRoots(homeDir: string): PlatformRoot[] {
	return PLATFORM_REGISTRY.flatMap((definition) => {
		const rootPath = expandHomePath(definition.skillsPath, homeDir)
		return rootPath
			? [{ displayName: definition.displayName, id: definition.id, rootPath }]
			: []
	})
}

/**
 * A platform counts as installed when its base directory exists.
 */
export async function detectPlatforms(
	homeDir: string,
	definitions: PlatformDefinition[] = PLATFORM_REGISTRY,
): Promise<IoResult<PlatformDetection[]>> {
	const detections: PlatformDetection[] = []

	for (const platform of definitions) {
		const detectPath = expandHomePath(platform.detectPath, homeDir)
		if (!detectPath) {
			continue
		}

		const detected = await isInstalled(detectPath)
		if (!detected.ok) {
			return detected
		}

		detections.push({ detectPath, detected: detected.value, platform })
	}

	return { ok: true, value: detections }
}

export async function isInstalled(detectPath: AbsolutePath): Promise<IoResult<boolean>> {
	const stats = await safeStat(detectPath)
	if (!stats.ok) {
		return stats
	}
	return { ok: true, value: Boolean(stats.value?.isDirectory()) }
}
