import { z } from 'zod';

// Zod schema for validating environment configuration
const serverConfigSchema = z.object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
    RATE_LIMIT_MAX: z.coerce.number().int().positive().default(100),
    SESSION_HEADER: z.string().min(1).default('x-session-id'),
    MCP_SERVER_NAME: z.string().min(1).default('TaskList')
});

export interface ServerConfig {
    port: number;
    rateLimitWindowMs: number;
    rateLimitMax: number;
    /** Request header naming the session whose task store is used */
    sessionHeader: string;
    mcpServerName: string;
}

export type LoadServerConfigResult =
    | { success: true; config: ServerConfig }
    | { success: false; error: string };

/**
 * Loads and validates server configuration from environment variables
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): LoadServerConfigResult {
    const validationResult = serverConfigSchema.safeParse(env);

    if (!validationResult.success) {
        return {
            success: false,
            error: `Invalid configuration: ${validationResult.error.issues
                .map(issue => `${issue.path.join('.')}: ${issue.message}`)
                .join('; ')}`
        };
    }

    const parsed = validationResult.data;
    return {
        success: true,
        config: {
            port: parsed.PORT,
            rateLimitWindowMs: parsed.RATE_LIMIT_WINDOW_MS,
            rateLimitMax: parsed.RATE_LIMIT_MAX,
            sessionHeader: parsed.SESSION_HEADER.toLowerCase(),
            mcpServerName: parsed.MCP_SERVER_NAME
        }
    };
}
