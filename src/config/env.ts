import { z } from "zod";

const optionalTrimmedString = z
	.string()
	.optional()
	.transform((v) => {
		if (typeof v !== "string") return undefined;
		const trimmed = v.trim();
		return trimmed ? trimmed : undefined;
	});

const commaList = (fallback: string) =>
	z
		.string()
		.default(fallback)
		.transform((v) =>
			v
				.split(",")
				.map((s) => s.trim())
				.filter((s) => s.length > 0)
		)
		.pipe(z.array(z.string().regex(/^[0-9A-Z]{5}$/)).min(1));

const EnvSchema = z.object({
	NODE_ENV: z
		.enum(["development", "production", "test"])
		.default("development"),
	PORT: z.coerce.number().default(3001),
	DATABASE_URL: z.url().optional(),

	// Prefix is compared verbatim, trailing space included
	USER_ERROR_PREFIX: z.string().min(1).default("app-exception: "),
	USER_ERROR_SQLSTATES: commaList("P0001"),

	LOCALES_DIR: optionalTrimmedString,
	DEFAULT_LOCALE: z.string().trim().min(2).default("en"),
});

export type Env = z.infer<typeof EnvSchema>;

export const loadEnv = (source: NodeJS.ProcessEnv = process.env): Env => {
	const parsed = EnvSchema.safeParse(source);
	if (!parsed.success) {
		console.error(z.treeifyError(parsed.error));
		throw new Error("Invalid environment variables");
	}

	if (parsed.data.NODE_ENV === "production" && !parsed.data.DATABASE_URL) {
		throw new Error("DATABASE_URL must be set in production");
	}

	return parsed.data;
};
