import type { Result, ValidationError } from "@skillmesh/core"
import type { InstallationSnapshot } from "@/platforms/types"
import { applyReconciliation } from "@/reconcile/apply"
import { planReconciliation, previewPlan, resolveConflicts } from "@/reconcile/plan"
import type {
	OutcomeSummary,
	ReconcileOutcome,
	ReconcileOptions,
	ReconcileTarget,
} from "@/reconcile/types"

/**
 * Plan, resolve and apply in one call. Dry runs stop after planning and
 * never prompt.
 */
export async function reconcile(
	source: InstallationSnapshot,
	targets: readonly ReconcileTarget[],
	options: ReconcileOptions,
): Promise<Result<ReconcileOutcome[], ValidationError>> {
	const planned = await planReconciliation(source, targets, options)
	if (!planned.ok) {
		return planned
	}

	if (options.dryRun) {
		return { ok: true, value: previewPlan(planned.value) }
	}

	const plan =
		options.onConflict === "ask" && options.confirm
			? await resolveConflicts(planned.value, options.confirm)
			: planned.value

	return applyReconciliation(plan)
}

export function summarizeOutcomes(outcomes: readonly ReconcileOutcome[]): OutcomeSummary {
	const summary: OutcomeSummary = {
		alreadyCorrect: 0,
		copied: 0,
		exitCode: 0,
		failed: 0,
		linked: 0,
		skippedDeclined: 0,
		skippedExisting: 0,
		total: outcomes.length,
	}

	for (const outcome of outcomes) {
		switch (outcome.action) {
			case "linked":
				summary.linked += 1
				break
			case "copied":
				summary.copied += 1
				break
			case "already_correct":
				summary.alreadyCorrect += 1
				break
			case "skipped_existing":
				summary.skippedExisting += 1
				break
			case "skipped_declined":
				summary.skippedDeclined += 1
				break
			case "failed":
				summary.failed += 1
				break
		}
	}

	const succeeded = summary.linked + summary.copied + summary.alreadyCorrect
	const skipped = summary.skippedExisting + summary.skippedDeclined
	if (summary.failed > 0) {
		summary.exitCode = 1
	} else if (succeeded === 0 && skipped > 0) {
		summary.exitCode = 2
	}

	return summary
}
