import { describe, it, expect } from 'vitest';
import { parseEnv, CommonEnvSchemas, z } from '../index.js';

const schema = z.object({
	PORT: CommonEnvSchemas.port,
	LOG_LEVEL: CommonEnvSchemas.logLevel,
	LOG_PRETTY: CommonEnvSchemas.boolean,
	DATABASE_URL: CommonEnvSchemas.url,
});

describe('parseEnv', () => {
	it('should apply defaults through the transforms', () => {
		const env = parseEnv(schema, { DATABASE_URL: 'postgres://localhost:5432/dolls' });

		expect(env).toEqual({
			PORT: 3000,
			LOG_LEVEL: 'info',
			LOG_PRETTY: false,
			DATABASE_URL: 'postgres://localhost:5432/dolls',
		});
	});

	it('should parse provided values', () => {
		const env = parseEnv(schema, {
			PORT: '8080',
			LOG_LEVEL: 'debug',
			LOG_PRETTY: '1',
			DATABASE_URL: 'postgres://db/dolls',
		});

		expect(env.PORT).toBe(8080);
		expect(env.LOG_LEVEL).toBe('debug');
		expect(env.LOG_PRETTY).toBe(true);
	});

	it('should list every invalid variable', () => {
		expect(() => parseEnv(schema, { PORT: '70000', DATABASE_URL: 'not a url' })).toThrow(
			/Environment validation failed:\n {2}PORT: .+\n {2}DATABASE_URL: /,
		);
	});

	it('should report object-level refinements under (root)', () => {
		const refined = z
			.object({ MODE: z.string(), ALLOWED: CommonEnvSchemas.boolean })
			.refine((env) => env.MODE !== 'none' || env.ALLOWED, { message: 'MODE=none needs ALLOWED=true' });

		expect(() => parseEnv(refined, { MODE: 'none' })).toThrow('  (root): MODE=none needs ALLOWED=true');
		expect(parseEnv(refined, { MODE: 'none', ALLOWED: 'true' })).toEqual({ MODE: 'none', ALLOWED: true });
	});
});
