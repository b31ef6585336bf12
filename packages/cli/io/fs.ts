import {
	lstat,
	mkdir,
	readFile,
	readlink,
	realpath,
	rename,
	rm,
	stat,
	writeFile,
} from "node:fs/promises"
import path from "node:path"
import type { AbsolutePath } from "@skillmesh/core"
import type { IoError, IoResult } from "@/io/types"

// Re-export types for convenience
export type { IoError, IoResult } from "@/io/types"

type StatResult = IoResult<Awaited<ReturnType<typeof stat>> | null>
type LStatResult = IoResult<Awaited<ReturnType<typeof lstat>> | null>

export async function safeStat(targetPath: string): Promise<StatResult> {
	try {
		const stats = await stat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(error, `Unable to access ${targetPath}.`, targetPath, "stat")
	}
}

export async function safeLstat(targetPath: string): Promise<LStatResult> {
	try {
		const stats = await lstat(targetPath)
		return { ok: true, value: stats }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(error, `Unable to access ${targetPath}.`, targetPath, "lstat")
	}
}

/**
 * Real path of an existing entry, or null when any part of it is missing.
 */
export async function safeRealpath(
	targetPath: string,
): Promise<IoResult<AbsolutePath | null>> {
	try {
		const resolved = await realpath(targetPath)
		return { ok: true, value: toAbsolutePath(resolved) }
	} catch (error) {
		if (isNotFound(error)) {
			return { ok: true, value: null }
		}

		return ioFailure(error, `Unable to resolve ${targetPath}.`, targetPath, "realpath")
	}
}

export async function readLink(targetPath: string): Promise<IoResult<string>> {
	try {
		const target = await readlink(targetPath)
		return { ok: true, value: target }
	} catch (error) {
		return ioFailure(error, `Unable to read link ${targetPath}.`, targetPath, "readlink")
	}
}

export async function ensureDir(targetPath: string): Promise<IoResult<void>> {
	const stats = await safeStat(targetPath)
	if (!stats.ok) {
		return stats
	}

	if (stats.value && !stats.value.isDirectory()) {
		return {
			error: {
				message: `Expected directory at ${targetPath}.`,
				operation: "mkdir",
				path: toAbsolutePath(targetPath),
				type: "io",
			},
			ok: false,
		}
	}

	if (!stats.value) {
		try {
			await mkdir(targetPath, { recursive: true })
		} catch (error) {
			return ioFailure(error, `Unable to create ${targetPath}.`, targetPath, "mkdir")
		}
	}

	return { ok: true, value: undefined }
}

export async function readTextFile(targetPath: string): Promise<IoResult<string>> {
	try {
		const contents = await readFile(targetPath, "utf8")
		return { ok: true, value: contents }
	} catch (error) {
		return ioFailure(error, `Unable to read ${targetPath}.`, targetPath, "readFile")
	}
}

export async function writeTextFile(
	targetPath: string,
	contents: string,
): Promise<IoResult<void>> {
	try {
		await writeFile(targetPath, contents, "utf8")
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(error, `Unable to write ${targetPath}.`, targetPath, "writeFile")
	}
}

export async function renamePath(
	fromPath: string,
	toPath: string,
): Promise<IoResult<void>> {
	try {
		await rename(fromPath, toPath)
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(
			error,
			`Unable to move ${fromPath} to ${toPath}.`,
			toPath,
			"rename",
		)
	}
}

export async function removePath(targetPath: string): Promise<IoResult<void>> {
	try {
		await rm(targetPath, { force: true, recursive: true })
		return { ok: true, value: undefined }
	} catch (error) {
		return ioFailure(error, `Unable to remove ${targetPath}.`, targetPath, "rm")
	}
}

export function toAbsolutePath(value: string): AbsolutePath {
	const resolved = path.isAbsolute(value) ? path.normalize(value) : path.resolve(value)
	return resolved as AbsolutePath
}

export function isNotFound(error: unknown): boolean {
	return errorCode(error) === "ENOENT"
}

function errorCode(error: unknown): string | undefined {
	if (typeof error === "object" && error !== null && "code" in error) {
		const { code } = error
		return typeof code === "string" ? code : undefined
	}
	return undefined
}

function ioFailure(
	error: unknown,
	message: string,
	targetPath: string,
	operation: string,
): { ok: false; error: IoError } {
	return {
		error: {
			message,
			operation,
			path: toAbsolutePath(targetPath),
			rawError: error instanceof Error ? error : undefined,
			type: "io",
		},
		ok: false,
	}
}
