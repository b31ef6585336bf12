import type { BaseError } from "@skillmesh/core"
import { consola } from "consola"
import type { SkmError } from "@/types/errors"

/**
 * How a command ended, as shown to the user. Engine calls return
 * `{ ok, value }` results; commands map them onto these four outcomes.
 */
export type CommandResult<T = void> =
	| { status: "completed"; value: T }
	| { status: "unchanged"; reason: string }
	| { status: "cancelled" }
	| { status: "failed"; error: SkmError }

export const CommandResult = {
	cancelled: (): CommandResult<never> => ({ status: "cancelled" }),
	completed: <T>(value: T): CommandResult<T> => ({ status: "completed", value }),
	failed: (error: SkmError): CommandResult<never> => ({ error, status: "failed" }),
	unchanged: (reason: string): CommandResult<never> => ({ reason, status: "unchanged" }),
} as const

export function printOutcome(result: CommandResult<unknown>): void {
	switch (result.status) {
		case "completed":
			consola.success("Done.")
			return
		case "unchanged":
			consola.info(result.reason)
			return
		case "cancelled":
			consola.info("Canceled.")
			return
		case "failed":
			consola.error(formatFailure(result.error))
			for (let error: BaseError | undefined = result.error; error; error = error.cause) {
				if (error.rawError) {
					consola.debug(error.rawError)
				}
			}
			process.exitCode = 1
	}
}

/**
 * One line for the failure, then one indented line per cause.
 *
 * A wrapping error (such as "Sync failed at snapshot.") prints its message
 * alone and leaves the path and operation to the cause that hit them. An
 * error without a cause is prefixed with its sync stage, when it has one.
 */
export function formatFailure(error: SkmError): string {
	if (!error.cause) {
		const stage = "stage" in error && typeof error.stage === "string" ? `[${error.stage}] ` : ""
		return `${stage}${describeError(error)}`
	}

	const lines = [error.message]
	for (let cause: BaseError | undefined = error.cause; cause; cause = cause.cause) {
		lines.push(`  ${describeError(cause)}`)
	}
	return lines.join("\n")
}

function describeError(error: BaseError): string {
	const context = contextOf(error)
	return context ? `${error.message} (${context})` : error.message
}

function contextOf(error: BaseError): string | null {
	const path = "path" in error && typeof error.path === "string" ? error.path : null

	if ("operation" in error && typeof error.operation === "string" && path) {
		return `${error.operation} ${path}`
	}
	if ("field" in error && typeof error.field === "string") {
		return `field ${error.field}`
	}
	if (path && !error.message.includes(path)) {
		return path
	}
	return null
}
