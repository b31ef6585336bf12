#!/usr/bin/env tsx

import { Command } from "commander"
import { consola } from "consola"
import { type AuditFormat, auditCommand } from "@/commands/audit"
import { distributeCommand } from "@/commands/distribute"
import { initCommand } from "@/commands/init"
import { type InventoryFormat, inventoryCommand } from "@/commands/inventory"
import { platformsCommand } from "@/commands/platforms"
import { syncCommand } from "@/commands/sync"
import pkg from "./package.json" with { type: "json" }

async function main(): Promise<void> {
	const program = new Command()

	program
		.name("skm")
		.description("Detect and repair skill drift across agent platforms")
		.version(pkg.version, "-V, --version", "Output the version number")
		.showHelpAfterError()
		.showSuggestionAfterError()

	program
		.command("init")
		.description("Write the skillmesh config")
		.option("--platforms <ids>", "Comma-separated list of platform ids")
		.option("--source <id>", "Platform that holds the canonical skills")
		.option("--mode <mode>", "Sync mode: symlink or copy")
		.option("--force", "Overwrite an existing config")
		.option("--non-interactive", "Run without prompts")
		.action(
			async (options: {
				platforms?: string
				source?: string
				mode?: string
				force?: boolean
				nonInteractive?: boolean
			}) => {
				await initCommand({
					force: Boolean(options.force),
					mode: options.mode,
					nonInteractive: Boolean(options.nonInteractive),
					platforms: options.platforms,
					source: options.source,
				})
			},
		)

	program
		.command("platforms")
		.description("List configured platforms")
		.action(async () => {
			await platformsCommand()
		})

	program
		.command("inventory")
		.description("List installed skills per platform")
		.option("--platform <id>", "Only list one platform")
		.option("--format <format>", "Output format: table or json", "table")
		.option("--include-marketplace", "Also list marketplace skills")
		.action(
			async (options: { platform?: string; format: string; includeMarketplace?: boolean }) => {
				await inventoryCommand({
					format: parseFormat<InventoryFormat>(options.format, ["table", "json"]),
					includeMarketplace: Boolean(options.includeMarketplace),
					platform: options.platform,
				})
			},
		)

	program
		.command("audit")
		.description("Check skills for drift across platforms")
		.argument("[skill]", "Skill name (defaults to every skill)")
		.option("--all", "Audit every skill")
		.option("--format <format>", "Output format: text or json", "text")
		.option("--verbose", "Show hashes, installations and warnings")
		.action(
			async (
				skill: string | undefined,
				options: { all?: boolean; format: string; verbose?: boolean },
			) => {
				await auditCommand(skill, {
					all: Boolean(options.all),
					format: parseFormat<AuditFormat>(options.format, ["text", "json"]),
					verbose: Boolean(options.verbose),
				})
			},
		)

	program
		.command("sync")
		.description("Link or copy a skill to the other platforms")
		.argument("[skill-path]", "Skill directory to sync from")
		.option("--all", "Sync every skill of the source platform")
		.option("--from <id>", "Source platform for --all")
		.option("--to <ids>", "Comma-separated target platform ids, all, or auto")
		.option("--mode <mode>", "Sync mode: symlink or copy")
		.option("--dry-run", "Plan changes without modifying files")
		.option("--force", "Replace existing targets")
		.option("--skip", "Keep existing targets")
		.option("--non-interactive", "Run without prompts")
		.action(
			async (
				skillPath: string | undefined,
				options: {
					all?: boolean
					from?: string
					to?: string
					mode?: string
					dryRun?: boolean
					force?: boolean
					skip?: boolean
					nonInteractive?: boolean
				},
			) => {
				await syncCommand(skillPath, {
					all: Boolean(options.all),
					dryRun: Boolean(options.dryRun),
					force: Boolean(options.force),
					from: options.from,
					mode: options.mode,
					nonInteractive: Boolean(options.nonInteractive),
					skip: Boolean(options.skip),
					to: options.to,
				})
			},
		)

	program
		.command("distribute")
		.description("Link marketplace skills into the target platforms")
		.option("--marketplace <name>", "Only distribute one marketplace")
		.option("--skill <name>", "Only distribute one skill")
		.option("--to <ids>", "Comma-separated target platform ids, all, or auto")
		.option("--include-claude", "Also link into claude, which reads marketplaces natively")
		.option("--list", "List marketplace skills instead of linking")
		.option("--status", "Show distribution status instead of linking")
		.option("--dry-run", "Plan changes without modifying files")
		.option("--force", "Replace existing targets")
		.option("--skip", "Keep existing targets")
		.option("--non-interactive", "Run without prompts")
		.action(
			async (options: {
				marketplace?: string
				skill?: string
				to?: string
				includeClaude?: boolean
				list?: boolean
				status?: boolean
				dryRun?: boolean
				force?: boolean
				skip?: boolean
				nonInteractive?: boolean
			}) => {
				await distributeCommand({
					dryRun: Boolean(options.dryRun),
					force: Boolean(options.force),
					includeClaude: Boolean(options.includeClaude),
					list: Boolean(options.list),
					marketplace: options.marketplace,
					nonInteractive: Boolean(options.nonInteractive),
					skill: options.skill,
					skip: Boolean(options.skip),
					status: Boolean(options.status),
					to: options.to,
				})
			},
		)

	if (process.argv.length <= 2) {
		program.outputHelp()
		return
	}

	await program.parseAsync(process.argv)
}

function parseFormat<T extends string>(value: string, allowed: readonly T[]): T {
	const match = allowed.find((format) => format === value)
	if (!match) {
		consola.error(`Unknown format "${value}". Use ${allowed.join(" or ")}.`)
		process.exit(1)
	}
	return match
}

main().catch((error: unknown) => {
	consola.error(error)
	process.exitCode = 1
})
