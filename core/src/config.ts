import { z } from 'zod';
import { ConfigurationError } from './lib/errors/errors.js';
import { DEFAULT_API_BASE_URL } from './lib/http/rest-client.js';

export const InteractionBotOptionsSchema = z.object({
    applicationId: z.string().regex(/^\d{1,20}$/, 'applicationId must be a Discord application ID'),
    publicKey: z.string().regex(/^[0-9a-fA-F]{64}$/, 'publicKey must be the 64-character hex public key from the developer portal'),
    uriPath: z.string().startsWith('/', 'uriPath must start with "/"').default('/api/interactions'),
    registerCommandsOnStartup: z.boolean().default(false),
    apiBaseUrl: z.string().url('apiBaseUrl must be a valid URL').default(DEFAULT_API_BASE_URL),
});

export type InteractionBotOptionsInput = z.input<typeof InteractionBotOptionsSchema>;
export type InteractionBotOptions = z.infer<typeof InteractionBotOptionsSchema>;

/** Validate bot options, listing every problem in one ConfigurationError. */
export function parseBotOptions(input: InteractionBotOptionsInput): InteractionBotOptions {
    const parsed = InteractionBotOptionsSchema.safeParse(input);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `- ${i.path.join('.')}: ${i.message}`);
        throw new ConfigurationError(`Invalid bot options:\n${issues.join('\n')}`);
    }
    return parsed.data;
}
