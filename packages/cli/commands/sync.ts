import { consola } from "consola"
import { describeTotals, outcomeRows, renderTable } from "@/commands/render"
import {
	type ConflictFlags,
	loadCommandConfig,
	parseList,
	parseMode,
	resolveConflictHandling,
} from "@/commands/shared"
import { CommandResult, printOutcome } from "@/commands/types"
import type { SkillmeshConfig } from "@/config/types"
import { summarizeOutcomes } from "@/reconcile/reconcile"
import { syncAll, syncSkill } from "@/sync/sync"
import type { SyncSummary } from "@/sync/types"

export interface SyncCommandOptions extends ConflictFlags {
	all: boolean
	from?: string
	mode?: string
	to?: string
}

export async function syncCommand(
	skillPath: string | undefined,
	options: SyncCommandOptions,
): Promise<void> {
	consola.info("skm sync")

	const loaded = await loadCommandConfig()
	if (loaded.status !== "completed") {
		printOutcome(loaded)
		return
	}

	const result = await runSync(loaded.value.config, skillPath, options)
	printOutcome(result)
	if (result.status === "completed" && result.value.totals.exitCode !== 0) {
		process.exitCode = result.value.totals.exitCode
	}
}

export async function runSync(
	config: SkillmeshConfig,
	skillPath: string | undefined,
	options: SyncCommandOptions,
): Promise<CommandResult<SyncSummary>> {
	if (!skillPath && !options.all) {
		return CommandResult.failed({
			field: "skill",
			message: "Pass a skill directory or --all.",
			source: "manual",
			type: "validation",
		})
	}
	if (skillPath && options.all) {
		return CommandResult.failed({
			field: "skill",
			message: "Pass either a skill directory or --all, not both.",
			source: "manual",
			type: "validation",
		})
	}

	const conflicts = resolveConflictHandling(options)
	if (conflicts.status !== "completed") {
		return conflicts
	}

	const mode = parseMode(options.mode)
	if (mode.status !== "completed") {
		return mode
	}

	const syncOptions = {
		...conflicts.value,
		dryRun: options.dryRun,
		mode: mode.value,
		to: parseList(options.to),
	}

	consola.start(options.dryRun ? "Planning sync..." : "Syncing skills...")

	let summary: SyncSummary
	if (skillPath) {
		const report = await syncSkill(skillPath, config, syncOptions)
		if (!report.ok) {
			return CommandResult.failed(report.error)
		}
		summary = {
			dryRun: options.dryRun,
			skills: [report.value],
			totals: summarizeOutcomes(report.value.outcomes),
		}
		if (report.value.outcomes.length === 0) {
			summary.noOpReason = "no-targets"
		}
	} else {
		const all = await syncAll(config, { ...syncOptions, from: options.from })
		if (!all.ok) {
			return CommandResult.failed(all.error)
		}
		summary = all.value
	}

	return reportSummary(summary)
}

/**
 * Print per-skill outcome tables and the totals line.
 */
export function reportSummary(summary: SyncSummary): CommandResult<SyncSummary> {
	if (summary.noOpReason === "no-skills") {
		return CommandResult.unchanged("No skills to sync.")
	}
	if (summary.noOpReason === "no-targets") {
		return CommandResult.unchanged("No target platforms to sync to.")
	}

	for (const skill of summary.skills) {
		for (const warning of skill.warnings) {
			consola.warn(warning)
		}
		consola.info(`${skill.skillName} (${skill.mode}) from ${skill.sourcePath}`)
		consola.log(
			renderTable(["Platform", "Action", "Target", "Detail"], outcomeRows(skill.outcomes)),
		)
	}

	consola.success(summary.dryRun ? "Plan complete." : "Sync complete.")
	consola.info(describeTotals(summary.totals, summary.dryRun))

	if (summary.totals.failed > 0) {
		consola.warn(`${summary.totals.failed} target(s) failed.`)
	}

	return CommandResult.completed(summary)
}
