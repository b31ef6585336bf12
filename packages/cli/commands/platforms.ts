import { consola } from "consola"
import { renderTable } from "@/commands/render"
import { loadCommandConfig } from "@/commands/shared"
import { CommandResult, printOutcome } from "@/commands/types"
import type { SkillmeshConfig } from "@/config/types"
import { safeStat } from "@/io/fs"

export interface PlatformStatus {
	id: string
	displayName: string
	rootPath: string
	enabled: boolean
	present: boolean
	isSource: boolean
}

export async function platformsCommand(): Promise<void> {
	const loaded = await loadCommandConfig()
	if (loaded.status !== "completed") {
		printOutcome(loaded)
		return
	}

	const result = await runPlatforms(loaded.value.config)
	if (result.status !== "completed") {
		printOutcome(result)
	}
}

export async function runPlatforms(
	config: SkillmeshConfig,
): Promise<CommandResult<PlatformStatus[]>> {
	const statuses: PlatformStatus[] = []
	for (const platform of config.platforms) {
		const stats = await safeStat(platform.rootPath)
		if (!stats.ok) {
			return CommandResult.failed(stats.error)
		}
		statuses.push({
			displayName: platform.displayName,
			enabled: platform.enabled,
			id: platform.id,
			isSource: platform.id === config.source,
			present: Boolean(stats.value?.isDirectory()),
			rootPath: platform.rootPath,
		})
	}

	const rows = statuses.map((status) => [
		status.isSource ? `${status.id} (source)` : status.id,
		status.displayName,
		status.enabled ? "yes" : "no",
		status.present ? "yes" : "no",
		status.rootPath,
	])
	consola.log(renderTable(["Platform", "Name", "Enabled", "Present", "Skills path"], rows))
	consola.info(`Sync mode: ${config.syncMode === "link" ? "symlink" : "copy"}`)

	return CommandResult.completed(statuses)
}
