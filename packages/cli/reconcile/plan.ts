import path from "node:path"
import type { Result, ValidationError } from "@skillmesh/core"
import { fingerprintMapsEqual, fingerprintTree } from "@/fingerprint/hash"
import { toAbsolutePath } from "@/io/fs"
import { inspectPath } from "@/platforms/links"
import type { InstallationSnapshot } from "@/platforms/types"
import type {
	ConfirmFn,
	ExistingKind,
	PlanOptions,
	ReconcileOutcome,
	ReconcilePlan,
	ReconcileTarget,
	ReconcileTask,
} from "@/reconcile/types"

/**
 * Decide what reconciling `source` onto each target would do.
 *
 * Planning only inspects the filesystem. Targets are independent: a
 * target that cannot be inspected becomes a `fail` task and the rest are
 * still planned.
 */
export async function planReconciliation(
	source: InstallationSnapshot,
	targets: readonly ReconcileTarget[],
	options: PlanOptions,
): Promise<Result<ReconcilePlan, ValidationError>> {
	if (!source.exists) {
		return {
			error: {
				field: "source",
				message: `Source ${source.skillPath} does not exist.`,
				path: source.skillPath,
				source: "manual",
				type: "validation",
			},
			ok: false,
		}
	}

	const tasks: ReconcileTask[] = []
	for (const target of targets) {
		tasks.push(await planTarget(source, target, options))
	}

	return { ok: true, value: { mode: options.mode, source, tasks } }
}

async function planTarget(
	source: InstallationSnapshot,
	target: ReconcileTarget,
	options: PlanOptions,
): Promise<ReconcileTask> {
	const base = {
		platformId: target.platformId,
		rootPath: target.rootPath,
		targetPath: toAbsolutePath(path.join(target.rootPath, source.skillName)),
	}

	const kind = await inspectPath(base.targetPath)
	if (!kind.ok) {
		return { ...base, detail: kind.error.message, kind: "fail" }
	}

	let existing: ExistingKind = "file"
	switch (kind.value.type) {
		case "missing":
			return { ...base, kind: "create" }
		case "symlink": {
			const { link } = kind.value
			if (options.mode === "link" && link.exists && link.target === source.resolvedPath) {
				return { ...base, detail: "Already linked to source.", kind: "already_correct" }
			}
			existing = "symlink"
			break
		}
		case "directory": {
			if (kind.value.realPath === source.resolvedPath) {
				return {
					...base,
					action: "skipped_existing",
					detail: "Target is the source installation.",
					kind: "skip",
				}
			}
			if (options.mode === "copy") {
				const tree = await fingerprintTree(kind.value.realPath)
				if (fingerprintMapsEqual(tree.files, source.files)) {
					return { ...base, detail: "Contents already match source.", kind: "already_correct" }
				}
			}
			existing = "directory"
			break
		}
		case "file":
		case "other":
			break
	}

	switch (options.onConflict) {
		case "force":
			return { ...base, existing, kind: "replace" }
		case "skip":
			return {
				...base,
				action: "skipped_existing",
				detail: `Existing ${existing} kept.`,
				kind: "skip",
			}
		case "ask":
			return { ...base, existing, kind: "confirm" }
	}
}

/**
 * Turn every `confirm` task into `replace` or a declined skip.
 * Prompts run one at a time, in target order.
 */
export async function resolveConflicts(
	plan: ReconcilePlan,
	confirm: ConfirmFn,
): Promise<ReconcilePlan> {
	const tasks: ReconcileTask[] = []
	for (const task of plan.tasks) {
		if (task.kind !== "confirm") {
			tasks.push(task)
			continue
		}

		const { existing, ...base } = task
		const accepted = await confirm(`Replace existing ${existing} at ${task.targetPath}?`)
		tasks.push(
			accepted
				? { ...base, existing, kind: "replace" }
				: {
						...base,
						action: "skipped_declined",
						detail: `Declined to replace existing ${existing}.`,
						kind: "skip",
					},
		)
	}

	return { ...plan, tasks }
}

export function hasUnresolvedConflicts(plan: ReconcilePlan): boolean {
	return plan.tasks.some((task) => task.kind === "confirm")
}

/**
 * Outcomes the plan would produce, without touching the filesystem.
 */
export function previewPlan(plan: ReconcilePlan): ReconcileOutcome[] {
	const action = plan.mode === "link" ? "linked" : "copied"
	const verb = plan.mode === "link" ? "link to" : "copy from"
	const sourcePath = plan.source.resolvedPath

	return plan.tasks.map((task): ReconcileOutcome => {
		const base = { dryRun: true, platformId: task.platformId, targetPath: task.targetPath }
		switch (task.kind) {
			case "create":
				return { ...base, action, detail: `Would ${verb} ${sourcePath}.` }
			case "replace":
				return {
					...base,
					action,
					detail: `Would replace existing ${task.existing} and ${verb} ${sourcePath}.`,
					replaced: task.existing,
				}
			case "confirm":
				return {
					...base,
					action,
					detail: `Would ask before replacing existing ${task.existing}.`,
					replaced: task.existing,
				}
			case "already_correct":
				return { ...base, action: "already_correct", detail: task.detail }
			case "skip":
				return { ...base, action: task.action, detail: task.detail }
			case "fail":
				return { ...base, action: "failed", detail: task.detail }
		}
	})
}
