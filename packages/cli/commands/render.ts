import { getBorderCharacters, table } from "table"
import type { SkillAudit } from "@/drift/types"
import type { OutcomeSummary, ReconcileOutcome } from "@/reconcile/types"

export function renderTable(header: string[], rows: string[][]): string {
	return table([header, ...rows], {
		border: getBorderCharacters("norc"),
		drawHorizontalLine: (index, size) => index === 0 || index === 1 || index === size,
	}).trimEnd()
}

/**
 * Human-readable lines for one audit: a status line, then one line per
 * differing file.
 */
export function describeAudit(audit: SkillAudit, verbose: boolean): string[] {
	const { report } = audit
	const platforms = report.platforms.join(", ")
	const lines: string[] = []

	switch (report.status) {
		case "single":
			lines.push(`${audit.skillName}: single (${platforms})`)
			break
		case "synced":
			lines.push(
				`${audit.skillName}: synced via ${report.symlinkConvergence?.target ?? "?"} (${platforms})`,
			)
			break
		case "ok":
			lines.push(`${audit.skillName}: ok (${platforms})`)
			break
		case "drift":
			lines.push(`${audit.skillName}: drift against ${report.baseline ?? "?"} (${platforms})`)
			break
	}

	for (const platformId of report.danglingLinks) {
		lines.push(`  ${platformId}: dangling link`)
	}
	for (const [platformId, files] of Object.entries(report.missingFiles)) {
		for (const file of files) {
			lines.push(`  ${platformId}: missing ${file}`)
		}
	}
	for (const [platformId, files] of Object.entries(report.extraFiles)) {
		for (const file of files) {
			lines.push(`  ${platformId}: extra ${file}`)
		}
	}
	for (const [platformId, files] of Object.entries(report.modifiedFiles)) {
		for (const file of files) {
			const hashes = verbose ? ` (${file.baselineHash} -> ${file.otherHash})` : ""
			lines.push(`  ${platformId}: modified ${file.relativePath}${hashes}`)
		}
	}

	if (verbose) {
		for (const snapshot of audit.snapshots) {
			const kind = snapshot.isSymlink ? `link -> ${snapshot.symlinkTarget ?? "?"}` : "directory"
			lines.push(
				`  ${snapshot.platformId}: ${snapshot.skillPath} (${kind}, ${snapshot.files.size} files)`,
			)
		}
	}

	return lines
}

export function outcomeRows(outcomes: readonly ReconcileOutcome[]): string[][] {
	return outcomes.map((outcome) => [
		outcome.platformId,
		outcome.action,
		outcome.targetPath,
		outcome.detail,
	])
}

export function describeTotals(summary: OutcomeSummary, dryRun: boolean): string {
	const prefix = dryRun ? "Would apply: " : ""
	return (
		`${prefix}${summary.linked} linked, ${summary.copied} copied, ` +
		`${summary.alreadyCorrect} already correct, ` +
		`${summary.skippedExisting + summary.skippedDeclined} skipped, ${summary.failed} failed.`
	)
}
