import path from "node:path"
import { stringify } from "smol-toml"
import type { SkillmeshConfig } from "@/config/types"

/**
 * Serialize a config to TOML. Paths under `homeDir` are written as `~/...`.
 */
export function serializeConfig(config: SkillmeshConfig, homeDir: string): string {
	const output: Record<string, unknown> = {
		sync_mode: config.syncMode === "copy" ? "copy" : "symlink",
	}

	if (config.source) {
		output.source = config.source
	}

	output.platforms = Object.fromEntries(
		config.platforms.map((platform) => [
			platform.id,
			{ enabled: platform.enabled, path: toHomeRelative(platform.rootPath, homeDir) },
		]),
	)

	if (config.marketplaces.length > 0) {
		output.marketplaces = Object.fromEntries(
			config.marketplaces.map((marketplace) => [
				marketplace.name,
				{ path: toHomeRelative(marketplace.path, homeDir) },
			]),
		)
	}

	const toml = stringify(output).trimEnd()
	return `${toml}\n`
}

export function toHomeRelative(value: string, homeDir: string): string {
	const relative = path.relative(homeDir, value)
	if (relative === "") {
		return "~"
	}
	if (relative.startsWith("..") || path.isAbsolute(relative)) {
		return value
	}
	return `~/${relative.split(path.sep).join("/")}`
}
