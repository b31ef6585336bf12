import type { AbsolutePath, PlatformId } from "@skillmesh/core"
import type { DriftReport, ModifiedFile } from "@/drift/types"
import { fingerprintsEqual } from "@/fingerprint/hash"
import type { InstallationSnapshot } from "@/platforms/types"

/**
 * Classify the installations of one skill.
 *
 * Link convergence is checked first and does not depend on order. Failing
 * that, every installation is diffed against the first one that exists, so
 * the file lists are relative to that baseline: a file present only on a
 * later platform is "extra" there, while a file present only on the
 * baseline is "missing" on each other platform. Dangling links always
 * classify as drift.
 */
export function classifyDrift(
	snapshots: ReadonlyMap<PlatformId, InstallationSnapshot>,
): DriftReport {
	const installations = [...snapshots.values()]
	const report: DriftReport = {
		baseline: null,
		danglingLinks: installations
			.filter((snapshot) => !snapshot.exists)
			.map((snapshot) => snapshot.platformId),
		extraFiles: {},
		missingFiles: {},
		modifiedFiles: {},
		platforms: [...snapshots.keys()],
		status: "single",
		symlinkConvergence: null,
	}

	if (installations.length < 2) {
		return report
	}

	const target = convergenceTarget(installations)
	if (target) {
		return { ...report, status: "synced", symlinkConvergence: { target } }
	}

	const baseline = installations.find((snapshot) => snapshot.exists) ?? installations[0]
	const others = installations.filter((snapshot) => snapshot !== baseline)
	report.baseline = baseline.platformId

	for (const other of others) {
		const missing: string[] = []
		const extra: string[] = []
		const modified: ModifiedFile[] = []

		for (const [relativePath, fingerprint] of baseline.files) {
			const counterpart = other.files.get(relativePath)
			if (!counterpart) {
				missing.push(relativePath)
			} else if (!fingerprintsEqual(fingerprint, counterpart)) {
				modified.push({
					baselineHash: fingerprint.contentHash,
					otherHash: counterpart.contentHash,
					relativePath,
				})
			}
		}

		for (const relativePath of other.files.keys()) {
			if (!baseline.files.has(relativePath)) {
				extra.push(relativePath)
			}
		}

		if (missing.length > 0) {
			report.missingFiles[other.platformId] = missing.sort(comparePaths)
		}
		if (extra.length > 0) {
			report.extraFiles[other.platformId] = extra.sort(comparePaths)
		}
		if (modified.length > 0) {
			report.modifiedFiles[other.platformId] = modified.sort((a, b) =>
				comparePaths(a.relativePath, b.relativePath),
			)
		}
	}

	const drifted =
		report.danglingLinks.length > 0 ||
		Object.keys(report.missingFiles).length > 0 ||
		Object.keys(report.extraFiles).length > 0 ||
		Object.keys(report.modifiedFiles).length > 0

	return { ...report, status: drifted ? "drift" : "ok" }
}

/**
 * The single existing path every installation converges on, if any.
 *
 * Either every installation is a link to the same existing target, or the
 * links share one target and every real installation is that target.
 */
function convergenceTarget(installations: InstallationSnapshot[]): AbsolutePath | null {
	const links = installations.filter((snapshot) => snapshot.isSymlink)
	const reals = installations.filter((snapshot) => !snapshot.isSymlink)

	if (links.length === 0) {
		return null
	}

	if (links.some((link) => !link.exists || !link.symlinkTarget)) {
		return null
	}

	const targets = new Set(links.map((link) => link.symlinkTarget))
	if (targets.size !== 1) {
		return null
	}

	const target = links[0].symlinkTarget
	if (!target) {
		return null
	}

	if (reals.every((real) => real.exists && real.resolvedPath === target)) {
		return target
	}

	return null
}

function comparePaths(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0
}
