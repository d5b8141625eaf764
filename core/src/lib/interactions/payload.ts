import { z } from 'zod';
import { MalformedInteractionError } from '../errors/errors.js';
import { RawAttachmentSchema } from '../entities/attachment.js';
import { RawChannelSchema } from '../entities/channel.js';
import { RawMemberSchema, RawPartialMemberSchema } from '../entities/member.js';
import { RawMessageSchema } from '../entities/message.js';
import { RawRoleSchema } from '../entities/role.js';
import { RawUserSchema, zSnowflake } from '../entities/user.js';

/** One entry of `data.options`; sub-commands and groups nest further entries. */
export interface RawCommandOption {
    name: string;
    type: number;
    value?: string | number | boolean;
    focused?: boolean;
    options?: RawCommandOption[];
}

export const RawCommandOptionSchema: z.ZodType<RawCommandOption> = z.lazy(() =>
    z.object({
        name: z.string(),
        type: z.number().int(),
        value: z.union([z.string(), z.number(), z.boolean()]).optional(),
        focused: z.boolean().optional(),
        options: z.array(RawCommandOptionSchema).optional(),
    }),
);

export const RawResolvedSchema = z.object({
    users: z.record(RawUserSchema).optional(),
    members: z.record(RawPartialMemberSchema).optional(),
    roles: z.record(RawRoleSchema).optional(),
    channels: z.record(RawChannelSchema).optional(),
    messages: z.record(RawMessageSchema).optional(),
    attachments: z.record(RawAttachmentSchema).optional(),
});

export type RawResolved = z.infer<typeof RawResolvedSchema>;

export const RawCommandDataSchema = z.object({
    id: zSnowflake,
    name: z.string(),
    type: z.number().int(),
    guild_id: zSnowflake.optional(),
    target_id: zSnowflake.optional(),
    options: z.array(RawCommandOptionSchema).optional(),
    resolved: RawResolvedSchema.optional(),
});

export type RawCommandData = z.infer<typeof RawCommandDataSchema>;

export const RawInteractionSchema = z.object({
    id: zSnowflake,
    application_id: zSnowflake,
    type: z.number().int(),
    token: z.string(),
    version: z.number().int().optional(),
    data: RawCommandDataSchema.optional(),
    guild_id: zSnowflake.optional(),
    channel_id: zSnowflake.optional(),
    channel: RawChannelSchema.optional(),
    member: RawMemberSchema.optional(),
    user: RawUserSchema.optional(),
    app_permissions: z.string().optional(),
    locale: z.string().optional(),
    guild_locale: z.string().optional(),
});

export type RawInteraction = z.infer<typeof RawInteractionSchema>;

/** Validate a decoded request body; any mismatch is a malformed request. */
export function parseInteraction(body: unknown): RawInteraction {
    const result = RawInteractionSchema.safeParse(body);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`);
        throw new MalformedInteractionError(`interaction payload validation failed: ${issues.join('; ')}`);
    }
    return result.data;
}
