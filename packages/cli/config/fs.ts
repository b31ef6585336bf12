import path from "node:path"
import type { AbsolutePath } from "@skillmesh/core"
import { CONFIG_FILENAME, expandHomePath, SKILLMESH_GLOBAL_DIR } from "@skillmesh/core"
import { buildDefaultConfig, parseConfig } from "@/config/parse"
import type { ConfigResult, LoadedConfig, SkillmeshConfig } from "@/config/types"
import { serializeConfig } from "@/config/write"
import { ensureDir, readTextFile, safeStat, toAbsolutePath, writeTextFile } from "@/io/fs"
import type { IoResult } from "@/io/types"

export const CONFIG_ENV_VAR = "SKILLMESH_CONFIG"

export interface ConfigLocation {
	env: NodeJS.ProcessEnv
	homeDir: string
}

/**
 * `$SKILLMESH_CONFIG` when set, else `~/.skillmesh/config.toml`.
 */
export function resolveConfigPath(location: ConfigLocation): AbsolutePath {
	const override = location.env[CONFIG_ENV_VAR]?.trim()
	if (override) {
		const expanded = expandHomePath(override, location.homeDir, process.cwd())
		if (expanded) {
			return expanded
		}
	}
	return toAbsolutePath(path.join(location.homeDir, SKILLMESH_GLOBAL_DIR, CONFIG_FILENAME))
}

/**
 * Load the config file, falling back to defaults when it does not exist.
 */
export async function loadConfig(location: ConfigLocation): Promise<ConfigResult<LoadedConfig>> {
	const configPath = resolveConfigPath(location)
	const stats = await safeStat(configPath)
	if (!stats.ok) {
		return stats
	}

	if (!stats.value) {
		return {
			ok: true,
			value: { config: buildDefaultConfig(configPath, location.homeDir), fromFile: false },
		}
	}

	const contents = await readTextFile(configPath)
	if (!contents.ok) {
		return contents
	}

	const parsed = parseConfig(contents.value, configPath, location.homeDir)
	if (!parsed.ok) {
		return parsed
	}

	return { ok: true, value: { config: parsed.value, fromFile: true } }
}

export async function saveConfig(config: SkillmeshConfig, homeDir: string): Promise<IoResult<void>> {
	const dirReady = await ensureDir(path.dirname(config.configPath))
	if (!dirReady.ok) {
		return dirReady
	}
	return writeTextFile(config.configPath, serializeConfig(config, homeDir))
}
