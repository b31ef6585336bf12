import path from "node:path"
import type { AbsolutePath, PlatformId } from "@skillmesh/core"
import { coercePlatformId, expandHomePath } from "@skillmesh/core"
import { parse, TomlError } from "smol-toml"
import { configSchema, formatZodError, type RawConfig } from "@/config/schema"
import type {
	ConfigResult,
	MarketplaceConfig,
	PlatformConfig,
	SkillmeshConfig,
} from "@/config/types"
import { defaultPlatformRoots, getPlatformById } from "@/platforms/registry"

/**
 * Parse and validate configuration TOML.
 *
 * `~/` paths are expanded against `homeDir`; other relative paths resolve
 * against the config file's directory. An absent or empty `[platforms]`
 * table means the built-in platforms at their default locations.
 */
export function parseConfig(
	contents: string,
	configPath: AbsolutePath,
	homeDir: string,
): ConfigResult<SkillmeshConfig> {
	let data: unknown
	try {
		data = parse(contents)
	} catch (error) {
		const message =
			error instanceof TomlError ? `Invalid TOML: ${error.message}` : "Invalid TOML."
		return {
			error: {
				message,
				path: configPath,
				rawError: error instanceof Error ? error : undefined,
				source: "toml",
				type: "parse",
			},
			ok: false,
		}
	}

	const parsed = configSchema.safeParse(data)
	if (!parsed.success) {
		return {
			error: {
				field: "config",
				message: formatZodError(parsed.error),
				path: configPath,
				source: "zod",
				type: "validation",
				zodError: parsed.error,
			},
			ok: false,
		}
	}

	const baseDir = path.dirname(configPath)
	const platforms = coercePlatforms(parsed.data, configPath, homeDir, baseDir)
	if (!platforms.ok) {
		return platforms
	}

	const marketplaces = coerceMarketplaces(parsed.data, configPath, homeDir, baseDir)
	if (!marketplaces.ok) {
		return marketplaces
	}

	let source: PlatformId | null = null
	if (parsed.data.source) {
		const id = coercePlatformId(parsed.data.source)
		if (!id || !platforms.value.some((platform) => platform.id === id)) {
			return invalid(
				`Source platform "${parsed.data.source}" is not configured.`,
				"source",
				configPath,
			)
		}
		source = id
	}

	return {
		ok: true,
		value: {
			configPath,
			marketplaces: marketplaces.value,
			platforms: platforms.value,
			source,
			syncMode: parsed.data.sync_mode === "copy" ? "copy" : "link",
		},
	}
}

/**
 * Configuration used when no file exists.
 */
export function buildDefaultConfig(configPath: AbsolutePath, homeDir: string): SkillmeshConfig {
	return {
		configPath,
		marketplaces: [],
		platforms: defaultPlatforms(homeDir),
		source: null,
		syncMode: "link",
	}
}

function defaultPlatforms(homeDir: string): PlatformConfig[] {
	return defaultPlatformRoots(homeDir).map((root) => ({ ...root, enabled: true }))
}

function coercePlatforms(
	data: RawConfig,
	configPath: AbsolutePath,
	homeDir: string,
	baseDir: string,
): ConfigResult<PlatformConfig[]> {
	const entries = Object.entries(data.platforms ?? {})
	if (entries.length === 0) {
		return { ok: true, value: defaultPlatforms(homeDir) }
	}

	const platforms: PlatformConfig[] = []
	const seen = new Set<PlatformId>()

	for (const [key, entry] of entries) {
		const id = coercePlatformId(key)
		if (!id) {
			return invalid(`Invalid platform id "${key}".`, `platforms.${key}`, configPath)
		}
		if (seen.has(id)) {
			return invalid(`Platform "${id}" is configured twice.`, `platforms.${key}`, configPath)
		}
		seen.add(id)

		const known = getPlatformById(id)
		const rawPath = entry.path ?? known?.skillsPath
		if (!rawPath) {
			return invalid(
				`Platform "${id}" is not built in and needs a path.`,
				`platforms.${key}.path`,
				configPath,
			)
		}

		const rootPath = expandHomePath(rawPath, homeDir, baseDir)
		if (!rootPath) {
			return invalid(`Invalid path for platform "${id}".`, `platforms.${key}.path`, configPath)
		}

		platforms.push({
			displayName: entry.name ?? known?.displayName ?? id,
			enabled: entry.enabled ?? true,
			id,
			rootPath,
		})
	}

	return { ok: true, value: platforms }
}

function coerceMarketplaces(
	data: RawConfig,
	configPath: AbsolutePath,
	homeDir: string,
	baseDir: string,
): ConfigResult<MarketplaceConfig[]> {
	const marketplaces: MarketplaceConfig[] = []

	for (const [name, entry] of Object.entries(data.marketplaces ?? {})) {
		const marketplacePath = expandHomePath(entry.path, homeDir, baseDir)
		if (!marketplacePath) {
			return invalid(
				`Invalid path for marketplace "${name}".`,
				`marketplaces.${name}.path`,
				configPath,
			)
		}
		marketplaces.push({ name, path: marketplacePath })
	}

	return { ok: true, value: marketplaces }
}

function invalid(message: string, field: string, configPath: AbsolutePath): ConfigResult<never> {
	return {
		error: {
			field,
			message,
			path: configPath,
			source: "manual",
			type: "validation",
		},
		ok: false,
	}
}
