/**
 * @dollhouse/config
 *
 * Loads `.env` into `process.env` and validates it with zod schemas.
 */

import 'dotenv/config';
import { z } from 'zod/v4';

export { z } from 'zod/v4';

/**
 * One line per issue, `path: message`. Issues raised on the object itself
 * (cross-field refinements without a path) are reported under `(root)`.
 */
export function formatEnvIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.map(String).join('.');
		return `  ${path || '(root)'}: ${issue.message}`;
	});
}

/**
 * Parse environment variables with a zod schema.
 *
 * @throws Error listing every invalid variable
 */
export function parseEnv<T extends z.ZodType>(
	schema: T,
	env: Record<string, string | undefined> = process.env,
): z.output<T> {
	const result = schema.safeParse(env);

	if (!result.success) {
		throw new Error(`Environment validation failed:\n${formatEnvIssues(result.error).join('\n')}`);
	}

	return result.data;
}

/**
 * Reusable environment variable schemas.
 *
 * In zod v4, .default() on a transformed schema expects the OUTPUT type.
 * .prefault() gives an INPUT default that still runs through the transform.
 */
export const CommonEnvSchemas = {
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

	port: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().min(1).max(65535))
		.prefault('3000'),

	/** 'true' or '1' */
	boolean: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('false'),

	positiveInt: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().positive()),

	url: z.url(),

	/** Non-blank string, trimmed */
	nonEmpty: z.string().trim().min(1),
};

export type ConfigType<T extends z.ZodType> = z.output<T>;
