import { z } from "zod";

export const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;
export type LogLevel = typeof LOG_LEVELS[number];

export interface ClientConfig {
    userAgent: string;
    /** request timeout in milliseconds */
    timeout: number;
    apiBaseUrl: string;
    sessionBaseUrl: string;
    logLevel: LogLevel;
}

export const ClientConfigSchema = z.object({
    userAgent: z.string().min(1),
    timeout: z.number().int().positive(),
    apiBaseUrl: z.string().url(),
    sessionBaseUrl: z.string().url(),
    logLevel: z.enum(LOG_LEVELS)
});

export const DEFAULT_CONFIG: Readonly<ClientConfig> = Object.freeze({
    userAgent: "mc-profile-client",
    timeout: 10000,
    apiBaseUrl: "https://api.mojang.com",
    sessionBaseUrl: "https://sessionserver.mojang.com",
    logLevel: "info"
});

export function getEnvConfig(env: NodeJS.ProcessEnv = process.env): Partial<ClientConfig> {
    const config: Partial<ClientConfig> = {};
    if (env.MC_PROFILE_USER_AGENT) {
        config.userAgent = env.MC_PROFILE_USER_AGENT;
    }
    if (env.MC_PROFILE_TIMEOUT) {
        config.timeout = Number(env.MC_PROFILE_TIMEOUT);
    }
    if (env.MC_PROFILE_API_URL) {
        config.apiBaseUrl = env.MC_PROFILE_API_URL;
    }
    if (env.MC_PROFILE_SESSION_URL) {
        config.sessionBaseUrl = env.MC_PROFILE_SESSION_URL;
    }
    if (env.MC_PROFILE_LOG_LEVEL) {
        const level = z.enum(LOG_LEVELS).parse(env.MC_PROFILE_LOG_LEVEL);
        config.logLevel = level;
    }
    return config;
}

/**
 * Defaults, then environment, then explicit overrides. Throws a ZodError if the result is invalid.
 */
export function getConfig(overrides: Partial<ClientConfig> = {}, env: NodeJS.ProcessEnv = process.env): ClientConfig {
    const base: ClientConfig = {...DEFAULT_CONFIG, ...getEnvConfig(env)};
    return ClientConfigSchema.parse({
        userAgent: overrides.userAgent ?? base.userAgent,
        timeout: overrides.timeout ?? base.timeout,
        apiBaseUrl: overrides.apiBaseUrl ?? base.apiBaseUrl,
        sessionBaseUrl: overrides.sessionBaseUrl ?? base.sessionBaseUrl,
        logLevel: overrides.logLevel ?? base.logLevel
    });
}
