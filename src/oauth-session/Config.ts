import dotenv from 'dotenv';
import * as crypto from 'crypto';
import { z } from 'zod';

// An empty VAR= line in .env means unset
function unsetIfEmpty<T extends z.ZodTypeAny>(schema: T) {
    return z.preprocess(value => value === '' ? undefined : value, schema);
}

const optionalString = unsetIfEmpty(z.string().optional());
const optionalPositiveInt = unsetIfEmpty(z.coerce.number().int().positive().optional());

const EnvSchema = z.object({
    OAUTH_PROVIDER: unsetIfEmpty(z.enum(['kerliix', 'entra']).default('kerliix')),
    PORT: unsetIfEmpty(z.coerce.number().int().positive().default(5175)),
    NODE_ENV: unsetIfEmpty(z.string().default('development')),
    FRONTEND_URL: unsetIfEmpty(z.string().url().default('http://localhost:5176')),
    SESSION_SECRET: optionalString,
    SESSION_MAX_AGE_SECONDS: optionalPositiveInt,
    COOKIE_SECURE: unsetIfEmpty(z.enum(['true', 'false']).default('false')),
    PKCE_TTL_SECONDS: unsetIfEmpty(z.coerce.number().int().positive().default(600)),

    KERLIIX_CLIENT_ID: optionalString,
    KERLIIX_CLIENT_SECRET: optionalString,
    KERLIIX_REDIRECT_URI: unsetIfEmpty(z.string().url().default('http://localhost:5175/callback')),
    KERLIIX_BASE_URL: unsetIfEmpty(z.string().url().default('https://api.kerliix.com')),

    ENTRA_TENANT_ID: optionalString,
    ENTRA_CLIENT_ID: optionalString,
    ENTRA_CLIENT_SECRET: optionalString,
    ENTRA_REDIRECT_URI: unsetIfEmpty(z.string().url().default('http://localhost:5175/callback')),
});

type Env = z.infer<typeof EnvSchema>;

export interface KerliixSettings {
    kind: 'kerliix';
    clientId: string;
    clientSecret?: string;
    redirectUri: string;
    baseUrl: string;
}

export interface EntraSettings {
    kind: 'entra';
    tenantId: string;
    clientId: string;
    clientSecret: string;
    redirectUri: string;
}

export type ProviderSettings = KerliixSettings | EntraSettings;

export interface SessionSettings {
    secret: string;
    /** True when no SESSION_SECRET was configured and a throwaway one was generated. */
    secretGenerated: boolean;
    maxAgeMs?: number;
    secure: boolean;
}

export interface AppConfig {
    port: number;
    nodeEnv: string;
    frontendUrl: string;
    session: SessionSettings;
    pkceTtlMs: number;
    provider: ProviderSettings;
}

const REQUIRED_ENV_VARS: Record<ProviderSettings['kind'], (keyof Env)[]> = {
    kerliix: ['KERLIIX_CLIENT_ID'],
    entra: ['ENTRA_TENANT_ID', 'ENTRA_CLIENT_ID', 'ENTRA_CLIENT_SECRET'],
};

function providerSettings(env: Env): ProviderSettings {
    const missingEnvVars = REQUIRED_ENV_VARS[env.OAUTH_PROVIDER].filter(varName => !env[varName]);
    if (missingEnvVars.length > 0) {
        throw new Error(`Missing required environment variables: ${missingEnvVars.join(', ')}`);
    }

    if (env.OAUTH_PROVIDER === 'entra') {
        return {
            kind: 'entra',
            tenantId: env.ENTRA_TENANT_ID ?? '',
            clientId: env.ENTRA_CLIENT_ID ?? '',
            clientSecret: env.ENTRA_CLIENT_SECRET ?? '',
            redirectUri: env.ENTRA_REDIRECT_URI,
        };
    }

    return {
        kind: 'kerliix',
        clientId: env.KERLIIX_CLIENT_ID ?? '',
        clientSecret: env.KERLIIX_CLIENT_SECRET,
        redirectUri: env.KERLIIX_REDIRECT_URI,
        baseUrl: env.KERLIIX_BASE_URL,
    };
}

/**
 * Validates the environment and builds the application configuration.
 * Pass an explicit env to skip reading .env from disk.
 */
export function loadConfig(source?: NodeJS.ProcessEnv): AppConfig {
    if (!source) {
        dotenv.config();
    }

    const parsed = EnvSchema.safeParse(source ?? process.env);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid environment configuration: ${issues}`);
    }

    const env = parsed.data;

    return {
        port: env.PORT,
        nodeEnv: env.NODE_ENV,
        frontendUrl: env.FRONTEND_URL,
        session: {
            secret: env.SESSION_SECRET ?? crypto.randomBytes(32).toString('base64url'),
            secretGenerated: !env.SESSION_SECRET,
            maxAgeMs: env.SESSION_MAX_AGE_SECONDS !== undefined ? env.SESSION_MAX_AGE_SECONDS * 1000 : undefined,
            secure: env.COOKIE_SECURE === 'true',
        },
        pkceTtlMs: env.PKCE_TTL_SECONDS * 1000,
        provider: providerSettings(env),
    };
}
