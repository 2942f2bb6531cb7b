import { ZodError } from 'zod';
import { envSchema, type Env } from './envSchema.js';

function withDbAliases(raw: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
    const next = { ...raw };
    if (!next.PGHOST && next.DB_HOST) next.PGHOST = next.DB_HOST;
    if (!next.PGPORT && next.DB_PORT) next.PGPORT = next.DB_PORT;
    if (!next.PGUSER && next.DB_USER) next.PGUSER = next.DB_USER;
    if (!next.PGPASSWORD && next.DB_PASSWORD) next.PGPASSWORD = next.DB_PASSWORD;
    if (!next.PGDATABASE && next.DB_NAME) next.PGDATABASE = next.DB_NAME;
    return next;
}

export function formatEnvIssues(err: ZodError): string {
    const lines = err.issues.map((i) => {
        const key = i.path.join('.') || '(root)';
        return `- ${key}: ${i.message}`;
    });
    return 'Invalid environment variables:\n' + lines.join('\n');
}

export function loadEnv(raw: NodeJS.ProcessEnv = process.env): Env {
    return envSchema.parse(withDbAliases(raw));
}

let env: Env;
try {
    env = loadEnv();
} catch (err) {
    if (err instanceof ZodError) {
        console.error(formatEnvIssues(err));
        process.exit(1);
    }
    throw err;
}

export { env };
export type { Env };
