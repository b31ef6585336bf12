import path from "node:path"
import type { PlatformConfig, SkillmeshConfig } from "@/config/types"
import { toAbsolutePath } from "@/io/fs"
import { isInstalled } from "@/platforms/registry"
import { failSync, syncValidation } from "@/sync/errors"
import type { SyncResult } from "@/sync/types"

/** Every configured platform, enabled or not. */
export const ALL_TARGETS = "all"
/** Configured platforms whose base directory exists. */
export const DETECTED_TARGETS = "auto"

/**
 * Platforms named by a `--to` list.
 *
 * Without a list, every enabled platform. A list is either platform ids or
 * one of the keywords `all` and `auto` on its own.
 */
export async function resolveTargetPlatforms(
	config: SkillmeshConfig,
	requested: readonly string[] | undefined,
): Promise<SyncResult<PlatformConfig[]>> {
	if (!requested || requested.length === 0) {
		return { ok: true, value: config.platforms.filter((platform) => platform.enabled) }
	}

	const keyword = requested.find((id) => id === ALL_TARGETS || id === DETECTED_TARGETS)
	if (keyword && requested.length > 1) {
		return syncValidation(
			"targets",
			"to",
			`"${keyword}" cannot be combined with other target platforms.`,
		)
	}

	if (keyword === ALL_TARGETS) {
		return { ok: true, value: [...config.platforms] }
	}

	if (keyword === DETECTED_TARGETS) {
		const detected: PlatformConfig[] = []
		for (const platform of config.platforms) {
			const installed = await isInstalled(toAbsolutePath(path.dirname(platform.rootPath)))
			if (!installed.ok) {
				return failSync("targets", installed.error)
			}
			if (installed.value) {
				detected.push(platform)
			}
		}
		return { ok: true, value: detected }
	}

	const targets: PlatformConfig[] = []
	for (const id of requested) {
		const platform = config.platforms.find((entry) => entry.id === id)
		if (!platform) {
			return syncValidation("targets", "to", `Unknown target platform "${id}".`)
		}
		if (!targets.includes(platform)) {
			targets.push(platform)
		}
	}
	return { ok: true, value: targets }
}
