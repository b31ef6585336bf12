import { z } from "zod"

const trimmedString = (label: string) =>
	z
		.string()
		.transform((value) => value.trim())
		.refine((value) => value.length > 0, {
			message: `${label} must not be empty.`,
		})

const platformSchema = z
	.object({
		enabled: z.boolean().optional(),
		name: trimmedString("platforms.name").optional(),
		path: trimmedString("platforms.path").optional(),
	})
	.strict()

const marketplaceSchema = z
	.object({
		path: trimmedString("marketplaces.path"),
	})
	.strict()

export const configSchema = z
	.object({
		marketplaces: z.record(marketplaceSchema).optional(),
		platforms: z.record(platformSchema).optional(),
		source: trimmedString("source").optional(),
		sync_mode: z.enum(["symlink", "copy"]).optional(),
	})
	.strict()

export type RawConfig = z.infer<typeof configSchema>

export function formatZodError(error: z.ZodError): string {
	const issues = error.issues.map((issue) => {
		const path = issue.path.length > 0 ? issue.path.join(".") : "config"
		return `${path}: ${issue.message}`
	})
	return `Invalid config: ${issues.join("; ")}`
}
