import { coerceSkillName } from "@skillmesh/core"
import { consola } from "consola"
import { describeAudit } from "@/commands/render"
import { loadCommandConfig } from "@/commands/shared"
import { CommandResult, printOutcome } from "@/commands/types"
import { platformRoots } from "@/config/roots"
import type { SkillmeshConfig } from "@/config/types"
import { auditAll, auditSkill, summarizeAudits } from "@/drift/audit"
import type { AuditResultSet } from "@/drift/types"

export type AuditFormat = "text" | "json"

export interface AuditCommandOptions {
	all: boolean
	format: AuditFormat
	verbose: boolean
}

export async function auditCommand(
	skillName: string | undefined,
	options: AuditCommandOptions,
): Promise<void> {
	const loaded = await loadCommandConfig()
	if (loaded.status !== "completed") {
		printOutcome(loaded)
		return
	}

	const result = await runAudit(loaded.value.config, skillName, options)
	if (result.status !== "completed") {
		printOutcome(result)
		return
	}

	if (result.value.summary.drift > 0) {
		process.exitCode = 1
	}
}

/**
 * Audit one skill or all of them and print the result. Skills in drift do
 * not make the command fail; the caller sets the exit code from the summary.
 */
export async function runAudit(
	config: SkillmeshConfig,
	skillName: string | undefined,
	options: AuditCommandOptions,
): Promise<CommandResult<AuditResultSet>> {
	const roots = platformRoots(config)
	if (roots.length === 0) {
		return CommandResult.unchanged("No platforms enabled.")
	}

	let results: AuditResultSet
	if (skillName && !options.all) {
		const name = coerceSkillName(skillName)
		if (!name) {
			return CommandResult.failed({
				field: "skill",
				message: `Invalid skill name "${skillName}".`,
				source: "manual",
				type: "validation",
			})
		}

		const audit = await auditSkill(name, roots)
		if (!audit.ok) {
			return CommandResult.failed(audit.error)
		}
		results = { audits: [audit.value], summary: summarizeAudits([audit.value]) }
	} else {
		const audits = await auditAll(roots)
		if (!audits.ok) {
			return CommandResult.failed(audits.error)
		}
		results = audits.value
	}

	if (options.format === "json") {
		const payload = {
			audits: results.audits.map((audit) => ({
				skill: audit.skillName,
				...audit.report,
				warnings: audit.warnings,
			})),
			summary: results.summary,
		}
		process.stdout.write(`${JSON.stringify(payload, null, 2)}\n`)
		return CommandResult.completed(results)
	}

	if (results.audits.length === 0) {
		return CommandResult.unchanged("No skills found.")
	}

	for (const audit of results.audits) {
		const message = describeAudit(audit, options.verbose).join("\n")
		if (audit.report.status === "drift") {
			consola.warn(message)
		} else {
			consola.info(message)
		}
		if (options.verbose) {
			for (const warning of audit.warnings) {
				consola.warn(warning)
			}
		}
	}

	const { summary } = results
	consola.info(
		`${summary.total} skill(s): ${summary.synced} synced, ${summary.ok} ok, ${summary.drift} drift, ${summary.single} single.`,
	)

	return CommandResult.completed(results)
}
