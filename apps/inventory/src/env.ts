/**
 * Environment Configuration
 *
 * Loads and validates environment variables for the inventory service.
 */

import { parseEnv, CommonEnvSchemas, z } from '@dollhouse/config';
import type { AuthConfig } from './authorization/index.js';

export const envSchema = z
	.object({
		// Server
		PORT: CommonEnvSchemas.port,
		HOST: z.string().default('0.0.0.0'),
		NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

		// Database
		DATABASE_URL: z.string().default('postgres://localhost:5432/dollhouse'),
		DATABASE_MAX_CONNECTIONS: CommonEnvSchemas.positiveInt.prefault('10'),

		// Logging
		LOG_LEVEL: CommonEnvSchemas.logLevel,
		LOG_PRETTY: CommonEnvSchemas.boolean,

		// Auth
		AUTH_MODE: z.enum(['none', 'forwardauth']).default('none'),
		ALLOW_INSECURE_LOCAL: CommonEnvSchemas.boolean,
		AUTH_HEADER_USER: z.string().default('X-Forwarded-User'),
		AUTH_HEADER_EMAIL: z.string().default('X-Forwarded-Email'),
		AUTH_HEADER_GROUPS: z.string().default('X-Forwarded-Groups'),

		// Group names for the permission tiers
		ADMIN_GROUP: z.string().default('dolls_admin'),
		EDITOR_GROUP: z.string().default('dolls_editor'),
		KID_GROUP: z.string().default('dolls_kid'),

		// Media
		MEDIA_BASE_PATH: z
			.string()
			.default('/media')
			.transform((v) => v.replace(/\/+$/, '')),
	})
	.refine((env) => env.AUTH_MODE !== 'none' || env.ALLOW_INSECURE_LOCAL, {
		message: 'AUTH_MODE=none requires ALLOW_INSECURE_LOCAL=true',
		path: ['ALLOW_INSECURE_LOCAL'],
	});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

export function getEnv(): Env {
	if (!cachedEnv) {
		cachedEnv = parseEnv(envSchema);
	}
	return cachedEnv;
}

export function loadEnv(source: Record<string, string | undefined>): Env {
	return parseEnv(envSchema, source);
}

/**
 * Identity resolver settings from the environment.
 */
export function authConfigFromEnv(env: Env): AuthConfig {
	return {
		mode: env.AUTH_MODE,
		headerUser: env.AUTH_HEADER_USER,
		headerEmail: env.AUTH_HEADER_EMAIL,
		headerGroups: env.AUTH_HEADER_GROUPS,
		groups: {
			admin: env.ADMIN_GROUP,
			editor: env.EDITOR_GROUP,
			kid: env.KID_GROUP,
		},
	};
}
