import { homedir } from "node:os"
import { isCancel, multiselect } from "@clack/prompts"
import type { PlatformId } from "@skillmesh/core"
import { coercePlatformId } from "@skillmesh/core"
import { consola } from "consola"
import { parseList, parseMode } from "@/commands/shared"
import { CommandResult, printOutcome } from "@/commands/types"
import { resolveConfigPath, saveConfig } from "@/config/fs"
import { buildDefaultConfig } from "@/config/parse"
import type { SkillmeshConfig } from "@/config/types"
import { safeStat } from "@/io/fs"
import { detectPlatforms, listPlatforms } from "@/platforms/registry"

export interface InitCommandOptions {
	platforms?: string
	source?: string
	mode?: string
	force: boolean
	nonInteractive: boolean
}

export async function initCommand(options: InitCommandOptions): Promise<void> {
	consola.info("skm init")

	const result = await runInit({ env: process.env, homeDir: homedir() }, options)
	if (result.status === "completed") {
		consola.success("Config written.")
		consola.info(`Config: ${result.value.configPath}`)
	}
	printOutcome(result)
}

export async function runInit(
	location: { env: NodeJS.ProcessEnv; homeDir: string },
	options: InitCommandOptions,
): Promise<CommandResult<SkillmeshConfig>> {
	const configPath = resolveConfigPath(location)
	const existing = await safeStat(configPath)
	if (!existing.ok) {
		return CommandResult.failed(existing.error)
	}
	if (existing.value && !options.force) {
		return CommandResult.failed({
			message: `Config already exists at ${configPath}. Use --force to overwrite.`,
			path: configPath,
			target: "config",
			type: "conflict",
		})
	}

	const mode = parseMode(options.mode)
	if (mode.status !== "completed") {
		return mode
	}

	const selection = await resolvePlatformSelection(location.homeDir, options)
	if (selection.status !== "completed") {
		return selection
	}

	const defaults = buildDefaultConfig(configPath, location.homeDir)
	const platforms = defaults.platforms.map((platform) => ({
		...platform,
		enabled: selection.value.has(platform.id),
	}))

	let source: PlatformId | null = null
	if (options.source !== undefined) {
		const id = coercePlatformId(options.source)
		if (!id || !selection.value.has(id)) {
			return CommandResult.failed({
				field: "source",
				message: `Source platform "${options.source}" must be one of the selected platforms.`,
				source: "manual",
				type: "validation",
			})
		}
		source = id
	}

	const config: SkillmeshConfig = {
		...defaults,
		platforms,
		source,
		syncMode: mode.value ?? defaults.syncMode,
	}

	const saved = await saveConfig(config, location.homeDir)
	if (!saved.ok) {
		return CommandResult.failed(saved.error)
	}

	return CommandResult.completed(config)
}

async function resolvePlatformSelection(
	homeDir: string,
	options: InitCommandOptions,
): Promise<CommandResult<Set<PlatformId>>> {
	const known = listPlatforms()

	const requested = parseList(options.platforms)
	if (requested !== undefined) {
		const selected = new Set<PlatformId>()
		for (const id of requested) {
			const platform = known.find((entry) => entry.id === id)
			if (!platform) {
				const validIds = known.map((entry) => entry.id).join(", ")
				return CommandResult.failed({
					field: "platforms",
					message: `Unknown platform "${id}". Valid platforms: ${validIds}.`,
					source: "manual",
					type: "validation",
				})
			}
			selected.add(platform.id)
		}
		return CommandResult.completed(selected)
	}

	const detection = await detectPlatforms(homeDir, known)
	if (!detection.ok) {
		return CommandResult.failed(detection.error)
	}
	const detected = detection.value
		.filter((entry) => entry.detected)
		.map((entry) => entry.platform.id)

	if (options.nonInteractive) {
		return CommandResult.completed(new Set(detected))
	}

	const selected = await multiselect<PlatformId>({
		initialValues: detected,
		message: "Select platforms to keep in sync (detected platforms are pre-selected)",
		options: known.map((platform) => ({
			label: `${platform.displayName} (${platform.id})`,
			value: platform.id,
		})),
		required: false,
	})

	if (isCancel(selected)) {
		return CommandResult.cancelled()
	}

	return CommandResult.completed(new Set(selected))
}
