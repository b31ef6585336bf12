import { homedir } from "node:os"
import { confirm, isCancel } from "@clack/prompts"
import { consola } from "consola"
import { CommandResult } from "@/commands/types"
import { loadConfig } from "@/config/fs"
import type { LoadedConfig } from "@/config/types"
import type { ConfirmFn, ConflictPolicy, ReconcileMode } from "@/reconcile/types"

export interface ConflictFlags {
	force: boolean
	skip: boolean
	nonInteractive: boolean
	dryRun: boolean
}

export interface ConflictHandling {
	onConflict: ConflictPolicy
	confirm?: ConfirmFn
}

export async function loadCommandConfig(): Promise<CommandResult<LoadedConfig>> {
	const loaded = await loadConfig({ env: process.env, homeDir: homedir() })
	if (!loaded.ok) {
		return CommandResult.failed(loaded.error)
	}

	if (!loaded.value.fromFile) {
		consola.info("No config found; using built-in platforms. Run `skm init` to create one.")
	}
	return CommandResult.completed(loaded.value)
}

/**
 * Map --force / --skip / --non-interactive to a conflict policy.
 * Interactive runs without either flag ask through a prompt.
 */
export function resolveConflictHandling(flags: ConflictFlags): CommandResult<ConflictHandling> {
	if (flags.force && flags.skip) {
		return CommandResult.failed({
			field: "force",
			message: "--force and --skip cannot be used together.",
			source: "manual",
			type: "validation",
		})
	}

	if (flags.force) {
		return CommandResult.completed({ onConflict: "force" })
	}

	if (flags.skip) {
		return CommandResult.completed({ onConflict: "skip" })
	}

	if (flags.nonInteractive && !flags.dryRun) {
		return CommandResult.failed({
			field: "onConflict",
			message: "Non-interactive runs need --force or --skip to handle existing targets.",
			source: "manual",
			type: "validation",
		})
	}

	return CommandResult.completed({
		confirm: flags.nonInteractive ? undefined : promptConfirm,
		onConflict: "ask",
	})
}

export const promptConfirm: ConfirmFn = async (message) => {
	const answer = await confirm({ initialValue: false, message })
	if (isCancel(answer)) {
		return false
	}
	return answer
}

export function parseMode(value: string | undefined): CommandResult<ReconcileMode | undefined> {
	if (value === undefined) {
		return CommandResult.completed(undefined)
	}

	const normalized = value.trim().toLowerCase()
	if (normalized === "symlink" || normalized === "link") {
		return CommandResult.completed("link")
	}
	if (normalized === "copy") {
		return CommandResult.completed("copy")
	}

	return CommandResult.failed({
		field: "mode",
		message: `Invalid mode "${value}". Use "symlink" or "copy".`,
		source: "manual",
		type: "validation",
	})
}

export function parseList(value: string | undefined): string[] | undefined {
	if (value === undefined) {
		return undefined
	}
	return value
		.split(",")
		.map((entry) => entry.trim().toLowerCase())
		.filter((entry) => entry.length > 0)
}
