import { createHash } from "node:crypto"
import type { Dirent } from "node:fs"
import { lstat, readdir, readFile, stat } from "node:fs/promises"
import path from "node:path"
import { type AbsolutePath, ERROR_HASH } from "@skillmesh/core"
import type { FileFingerprint, FingerprintMap, TreeFingerprint } from "@/fingerprint/types"
import { DEFAULT_CONCURRENCY, mapWithConcurrency } from "@/utils/concurrency"

/**
 * Fingerprint one file. Never rejects: an unreadable file gets the
 * ERROR_HASH sentinel so it mismatches everything it is compared with.
 */
export async function fingerprintFile(
	filePath: string,
	relativePath: string,
): Promise<FileFingerprint> {
	try {
		const content = await readFile(filePath)
		return {
			contentHash: createHash("md5").update(content).digest("hex"),
			relativePath,
			sizeBytes: content.byteLength,
		}
	} catch (error) {
		return {
			contentHash: ERROR_HASH,
			readError: error instanceof Error ? error.message : String(error),
			relativePath,
			sizeBytes: await sizeOrZero(filePath),
		}
	}
}

/**
 * Fingerprint every file below `root`.
 *
 * Symlinked files are followed and hashed by their target's bytes.
 * Symlinked directories are never descended into; they are listed in
 * `skippedDirectoryLinks` instead. A directory that cannot be listed
 * contributes no entries and a warning.
 */
export async function fingerprintTree(root: AbsolutePath): Promise<TreeFingerprint> {
	const files: FingerprintMap = new Map()
	const skippedDirectoryLinks: string[] = []
	const warnings: string[] = []

	await walk(root, "")

	for (const fingerprint of files.values()) {
		if (fingerprint.contentHash === ERROR_HASH) {
			warnings.push(
				`Unable to read ${path.join(root, fingerprint.relativePath)}: ${fingerprint.readError ?? "unknown error"}`,
			)
		}
	}

	return { files, root, skippedDirectoryLinks, warnings }

	async function walk(directory: string, prefix: string): Promise<void> {
		let entries: Dirent[]
		try {
			entries = await readdir(directory, { withFileTypes: true })
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error)
			warnings.push(`Unable to list ${directory}: ${reason}`)
			return
		}

		entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))

		for (const entry of entries) {
			const fullPath = path.join(directory, entry.name)
			const relativePath = prefix ? `${prefix}/${entry.name}` : entry.name

			if (entry.isDirectory()) {
				await walk(fullPath, relativePath)
			} else if (entry.isFile()) {
				files.set(relativePath, await fingerprintFile(fullPath, relativePath))
			} else if (entry.isSymbolicLink()) {
				if (await isDirectoryTarget(fullPath)) {
					skippedDirectoryLinks.push(relativePath)
					continue
				}
				// Dangling links land here too and get the sentinel hash.
				files.set(relativePath, await fingerprintFile(fullPath, relativePath))
			}
		}
	}
}

/**
 * Fingerprint independent trees in parallel, at most `concurrency` at a time.
 */
export async function fingerprintTrees(
	roots: readonly AbsolutePath[],
	options: { concurrency?: number } = {},
): Promise<TreeFingerprint[]> {
	return mapWithConcurrency(roots, options.concurrency ?? DEFAULT_CONCURRENCY, (root) =>
		fingerprintTree(root),
	)
}

export function isErrorFingerprint(fingerprint: FileFingerprint): boolean {
	return fingerprint.contentHash === ERROR_HASH
}

/**
 * Content equality. The error sentinel is unequal to every hash, itself included.
 */
export function fingerprintsEqual(a: FileFingerprint, b: FileFingerprint): boolean {
	if (isErrorFingerprint(a) || isErrorFingerprint(b)) {
		return false
	}
	return a.contentHash === b.contentHash && a.sizeBytes === b.sizeBytes
}

export function fingerprintMapsEqual(a: FingerprintMap, b: FingerprintMap): boolean {
	if (a.size !== b.size) {
		return false
	}

	for (const [relativePath, fingerprint] of a) {
		const other = b.get(relativePath)
		if (!other || !fingerprintsEqual(fingerprint, other)) {
			return false
		}
	}

	return true
}

async function isDirectoryTarget(linkPath: string): Promise<boolean> {
	try {
		const stats = await stat(linkPath)
		return stats.isDirectory()
	} catch {
		return false
	}
}

async function sizeOrZero(filePath: string): Promise<number> {
	try {
		const stats = await lstat(filePath)
		return stats.size
	} catch {
		return 0
	}
}
