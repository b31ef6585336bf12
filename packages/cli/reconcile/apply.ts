import { cp, lstat, stat, symlink } from "node:fs/promises"
import path from "node:path"
import type { AbsolutePath, Result, ValidationError } from "@skillmesh/core"
import { ensureDir, removePath, renamePath } from "@/io/fs"
import type { IoResult } from "@/io/types"
import { hasUnresolvedConflicts } from "@/reconcile/plan"
import type {
	ExistingKind,
	ReconcileMode,
	ReconcileOutcome,
	ReconcilePlan,
	ReconcileTask,
} from "@/reconcile/types"

/**
 * Execute a plan, one target at a time.
 *
 * A plan with unanswered `confirm` tasks is refused before any target is
 * touched. Per-target I/O failures become `failed` outcomes.
 */
export async function applyReconciliation(
	plan: ReconcilePlan,
): Promise<Result<ReconcileOutcome[], ValidationError>> {
	if (hasUnresolvedConflicts(plan)) {
		const pending = plan.tasks.filter((task) => task.kind === "confirm").length
		return {
			error: {
				field: "onConflict",
				message: `${pending} existing target(s) need confirmation. Use --force or --skip when running non-interactively.`,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const outcomes: ReconcileOutcome[] = []
	for (const task of plan.tasks) {
		outcomes.push(await applyTask(plan, task))
	}

	return { ok: true, value: outcomes }
}

async function applyTask(plan: ReconcilePlan, task: ReconcileTask): Promise<ReconcileOutcome> {
	const base = { dryRun: false, platformId: task.platformId, targetPath: task.targetPath }
	const sourcePath = plan.source.resolvedPath
	const action = plan.mode === "link" ? "linked" : "copied"

	switch (task.kind) {
		case "create": {
			const rootReady = await ensureDir(task.rootPath)
			if (!rootReady.ok) {
				return { ...base, action: "failed", detail: rootReady.error.message }
			}

			const created = await materialize(sourcePath, task.targetPath, plan.mode)
			if (!created.ok) {
				return { ...base, action: "failed", detail: created.error.message }
			}

			return { ...base, action, detail: describeResult(plan.mode, sourcePath) }
		}
		case "replace": {
			const replaced = await replaceTarget(sourcePath, task.targetPath, task.existing, plan.mode)
			if (!replaced.ok) {
				return { ...base, action: "failed", detail: replaced.error.message }
			}

			const detail = [
				`Replaced existing ${task.existing}.`,
				describeResult(plan.mode, sourcePath),
				replaced.value.leftover
					? `Previous content left at ${replaced.value.leftover}.`
					: null,
			]
				.filter((part): part is string => part !== null)
				.join(" ")

			return { ...base, action, detail, replaced: task.existing }
		}
		case "confirm":
			return { ...base, action: "failed", detail: "Replacement was not confirmed." }
		case "already_correct":
			return { ...base, action: "already_correct", detail: task.detail }
		case "skip":
			return { ...base, action: task.action, detail: task.detail }
		case "fail":
			return { ...base, action: "failed", detail: task.detail }
	}
}

function describeResult(mode: ReconcileMode, sourcePath: AbsolutePath): string {
	return mode === "link" ? `Linked to ${sourcePath}.` : `Copied from ${sourcePath}.`
}

/**
 * Create the link or copy of `sourcePath` at `destination`, which must not exist.
 */
export async function materialize(
	sourcePath: AbsolutePath,
	destination: string,
	mode: ReconcileMode,
): Promise<IoResult<void>> {
	try {
		if (mode === "link") {
			await symlink(sourcePath, destination, process.platform === "win32" ? "junction" : "dir")
		} else {
			await cp(sourcePath, destination, {
				dereference: true,
				errorOnExist: true,
				filter: (entry) => isCopyable(entry),
				force: false,
				recursive: true,
			})
		}
		return { ok: true, value: undefined }
	} catch (error) {
		const verb = mode === "link" ? "link" : "copy"
		return {
			error: {
				message: `Unable to ${verb} ${sourcePath} to ${destination}.`,
				operation: mode === "link" ? "symlink" : "cp",
				path: sourcePath,
				rawError: error instanceof Error ? error : undefined,
				type: "io",
			},
			ok: false,
		}
	}
}

/**
 * Copies carry the same entries fingerprinting sees: linked directories
 * and dangling links are left out.
 */
async function isCopyable(entry: string): Promise<boolean> {
	const linkStats = await lstat(entry)
	if (!linkStats.isSymbolicLink()) {
		return true
	}

	try {
		const targetStats = await stat(entry)
		return !targetStats.isDirectory()
	} catch {
		return false
	}
}

interface ReplaceOutcome {
	/** Where the previous content remains when it could not be removed. */
	leftover: string | null
}

/**
 * Swap `targetPath` for a fresh link or copy of `sourcePath`.
 *
 * The replacement is staged beside the target first. A link over a
 * non-directory is renamed straight into place; otherwise the old entry is
 * moved aside, the staged entry renamed in, and the old entry removed.
 * The original is restored if the swap fails.
 */
export async function replaceTarget(
	sourcePath: AbsolutePath,
	targetPath: AbsolutePath,
	existing: ExistingKind,
	mode: ReconcileMode,
): Promise<IoResult<ReplaceOutcome>> {
	const stagingPath = siblingPath(targetPath, "staging")
	const staged = await materialize(sourcePath, stagingPath, mode)
	if (!staged.ok) {
		await removePath(stagingPath)
		return staged
	}

	if (mode === "link" && existing !== "directory") {
		const swapped = await renamePath(stagingPath, targetPath)
		if (!swapped.ok) {
			await removePath(stagingPath)
			return swapped
		}
		return { ok: true, value: { leftover: null } }
	}

	const backupPath = siblingPath(targetPath, "previous")
	const movedAside = await renamePath(targetPath, backupPath)
	if (!movedAside.ok) {
		await removePath(stagingPath)
		return movedAside
	}

	const swapped = await renamePath(stagingPath, targetPath)
	if (!swapped.ok) {
		const restored = await renamePath(backupPath, targetPath)
		await removePath(stagingPath)
		if (!restored.ok) {
			return {
				error: {
					...swapped.error,
					cause: restored.error,
					message: `Unable to replace ${targetPath}; original content left at ${backupPath}.`,
				},
				ok: false,
			}
		}
		return swapped
	}

	const cleaned = await removePath(backupPath)
	return { ok: true, value: { leftover: cleaned.ok ? null : backupPath } }
}

function siblingPath(targetPath: AbsolutePath, purpose: "staging" | "previous"): string {
	const name = `.${path.basename(targetPath)}.skillmesh-${purpose}-${process.pid}-${Date.now()}`
	return path.join(path.dirname(targetPath), name)
}
