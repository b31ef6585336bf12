import { consola } from "consola"
import { renderTable } from "@/commands/render"
import {
	type ConflictFlags,
	loadCommandConfig,
	parseList,
	resolveConflictHandling,
} from "@/commands/shared"
import { reportSummary } from "@/commands/sync"
import { CommandResult, printOutcome } from "@/commands/types"
import type { SkillmeshConfig } from "@/config/types"
import {
	distributeMarketplaces,
	distributionStatus,
	listMarketplaceSkills,
	type MarketplaceFilter,
} from "@/sync/distribute"
import type { DistributionEntry, MarketplaceSkill, SyncSummary } from "@/sync/types"

const DESCRIPTION_WIDTH = 50

export interface DistributeCommandOptions extends ConflictFlags {
	marketplace?: string
	skill?: string
	to?: string
	includeClaude?: boolean
	list?: boolean
	status: boolean
}

export async function distributeCommand(options: DistributeCommandOptions): Promise<void> {
	consola.info("skm distribute")

	const loaded = await loadCommandConfig()
	if (loaded.status !== "completed") {
		printOutcome(loaded)
		return
	}

	if (options.list) {
		printOutcome(await runDistributeList(loaded.value.config, options.marketplace))
		return
	}

	if (options.status) {
		printOutcome(
			await runDistributionStatus(loaded.value.config, {
				includeNative: options.includeClaude,
				marketplace: options.marketplace,
			}),
		)
		return
	}

	const result = await runDistribute(loaded.value.config, options)
	printOutcome(result)
	if (result.status === "completed" && result.value.totals.exitCode !== 0) {
		process.exitCode = result.value.totals.exitCode
	}
}

export async function runDistribute(
	config: SkillmeshConfig,
	options: DistributeCommandOptions,
): Promise<CommandResult<SyncSummary>> {
	if (config.marketplaces.length === 0) {
		return CommandResult.unchanged("No marketplaces configured.")
	}

	const conflicts = resolveConflictHandling(options)
	if (conflicts.status !== "completed") {
		return conflicts
	}

	consola.start(options.dryRun ? "Planning distribution..." : "Distributing skills...")

	const result = await distributeMarketplaces(config, {
		...conflicts.value,
		dryRun: options.dryRun,
		includeNative: options.includeClaude,
		marketplace: options.marketplace,
		skill: options.skill,
		to: parseList(options.to),
	})
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	for (const platformId of result.value.excludedPlatforms ?? []) {
		consola.info(
			`Skipping ${platformId}: it reads marketplaces natively. Use --include-claude to link anyway.`,
		)
	}

	return reportSummary(result.value)
}

/**
 * Print every marketplace skill with its description.
 */
export async function runDistributeList(
	config: SkillmeshConfig,
	marketplace: string | undefined,
): Promise<CommandResult<MarketplaceSkill[]>> {
	if (config.marketplaces.length === 0) {
		return CommandResult.unchanged("No marketplaces configured.")
	}

	const result = await listMarketplaceSkills(config, { marketplace })
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	if (result.value.length === 0) {
		return CommandResult.unchanged("No marketplace skills found.")
	}

	const rows = result.value.map((skill) => [
		skill.marketplace,
		skill.skillName,
		truncate(skill.description ?? ""),
	])
	consola.log(renderTable(["Marketplace", "Skill", "Description"], rows))
	consola.info(`${result.value.length} skill(s) available.`)

	return CommandResult.completed(result.value)
}

export async function runDistributionStatus(
	config: SkillmeshConfig,
	filter: MarketplaceFilter = {},
): Promise<CommandResult<DistributionEntry[]>> {
	if (config.marketplaces.length === 0) {
		return CommandResult.unchanged("No marketplaces configured.")
	}

	const result = await distributionStatus(config, filter)
	if (!result.ok) {
		return CommandResult.failed(result.error)
	}

	if (result.value.length === 0) {
		return CommandResult.unchanged("No marketplace skills found.")
	}

	const rows = result.value.map((entry) => [
		entry.marketplace,
		entry.skillName,
		entry.platformId,
		formatState(entry),
	])
	consola.log(renderTable(["Marketplace", "Skill", "Platform", "Status"], rows))

	return CommandResult.completed(result.value)
}

function formatState(entry: DistributionEntry): string {
	switch (entry.state) {
		case "linked":
			return "linked"
		case "linked_elsewhere":
			return `linked elsewhere (${entry.linkTarget ?? "?"})`
		case "exists":
			return "exists (not a link)"
		case "absent":
			return "not distributed"
	}
}

export function truncate(text: string): string {
	return text.length > DESCRIPTION_WIDTH ? `${text.slice(0, DESCRIPTION_WIDTH)}...` : text
}
