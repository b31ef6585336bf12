import type { AbsolutePath } from "@skillmesh/core"

export interface FileFingerprint {
	/** Path inside the installation, `/`-separated. */
	relativePath: string
	/** Hex MD5 of the file bytes, or ERROR_HASH when the file was unreadable. */
	contentHash: string
	sizeBytes: number
	readError?: string
}

export type FingerprintMap = Map<string, FileFingerprint>

export interface TreeFingerprint {
	root: AbsolutePath
	files: FingerprintMap
	/** Symlinked sub-directories that were not descended into. */
	skippedDirectoryLinks: string[]
	warnings: string[]
}
