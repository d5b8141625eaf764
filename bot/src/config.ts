import 'dotenv/config';
import { z } from 'zod';

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform(value => value === 'true' || value === '1');

export const EnvSchema = z.object({
    APPLICATION_ID: z.string().regex(/^\d{15,21}$/, 'APPLICATION_ID is required (Discord application ID)'),
    PUBLIC_KEY: z.string().regex(/^[0-9a-fA-F]{64}$/, 'PUBLIC_KEY is required (hex Ed25519 key from the developer portal)'),
    SECRET_KEY: z.string().min(1, 'SECRET_KEY is required (bot token)'),
    PORT: z.coerce.number().int().min(1).max(65535).default(8080),
    HOST: z.string().min(1).default('0.0.0.0'),
    URI_PATH: z.string().startsWith('/', 'URI_PATH must start with "/"').default('/api/interactions'),
    REGISTER_COMMANDS_ON_STARTUP: booleanFlag,
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
});

export type BotConfig = z.infer<typeof EnvSchema>;

export const loadBotConfig = (env: NodeJS.ProcessEnv = process.env): BotConfig => {
    const parsed = EnvSchema.safeParse(env);

    if (!parsed.success) {
        console.error('❌ Invalid bot environment configuration:');
        for (const issue of parsed.error.issues) {
            console.error(`- ${issue.path.join('.')}: ${issue.message}`);
        }
        process.exit(1);
    }

    return parsed.data;
};

/**
 * The library's logger and server read LOG_LEVEL and NODE_ENV from the
 * process environment; write the validated values back so defaults apply there too.
 */
export const exportLoggingEnv = (config: BotConfig, env: NodeJS.ProcessEnv = process.env): void => {
    env.LOG_LEVEL = config.LOG_LEVEL;
    env.NODE_ENV = config.NODE_ENV;
};
