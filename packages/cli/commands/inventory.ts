import { consola } from "consola"
import { renderTable } from "@/commands/render"
import { loadCommandConfig } from "@/commands/shared"
import { CommandResult, printOutcome } from "@/commands/types"
import { findPlatform, marketplaceRoots, platformRoots } from "@/config/roots"
import type { SkillmeshConfig } from "@/config/types"
import { inventorySkills } from "@/platforms/locate"
import type { PlatformInventory } from "@/platforms/types"

export type InventoryFormat = "table" | "json"

export interface InventoryCommandOptions {
	platform?: string
	format: InventoryFormat
	/** Also list the skills of every configured marketplace. */
	includeMarketplace?: boolean
}

export async function inventoryCommand(options: InventoryCommandOptions): Promise<void> {
	const loaded = await loadCommandConfig()
	if (loaded.status !== "completed") {
		printOutcome(loaded)
		return
	}

	const result = await runInventory(loaded.value.config, options)
	if (result.status !== "completed") {
		printOutcome(result)
	}
}

export async function runInventory(
	config: SkillmeshConfig,
	options: InventoryCommandOptions,
): Promise<CommandResult<PlatformInventory[]>> {
	let roots = platformRoots(config)
	if (options.platform) {
		const platform = findPlatform(config, options.platform.trim().toLowerCase())
		if (!platform) {
			return CommandResult.failed({
				message: `Unknown platform "${options.platform}".`,
				target: "platform",
				type: "not_found",
			})
		}
		roots = [{ displayName: platform.displayName, id: platform.id, rootPath: platform.rootPath }]
	}

	if (options.includeMarketplace) {
		roots = [...roots, ...marketplaceRoots(config)]
	}

	const inventories = await inventorySkills(roots)
	if (!inventories.ok) {
		return CommandResult.failed(inventories.error)
	}

	if (options.format === "json") {
		process.stdout.write(`${JSON.stringify(inventories.value, null, 2)}\n`)
		return CommandResult.completed(inventories.value)
	}

	for (const inventory of inventories.value) {
		const { platform, skills } = inventory
		consola.info(
			`${platform.displayName} (${platform.id}): ${skills.length} skill(s) in ${platform.rootPath}`,
		)
		for (const warning of inventory.warnings) {
			consola.warn(warning)
		}
		if (skills.length === 0) {
			continue
		}

		const rows = skills.map((entry) => [
			entry.directoryName,
			entry.valid ? entry.name : "(invalid)",
			entry.isSymlink ? `-> ${entry.symlinkTarget ?? "?"}` : "directory",
			entry.description ?? "",
		])
		consola.log(renderTable(["Directory", "Name", "Install", "Description"], rows))
	}

	return CommandResult.completed(inventories.value)
}
