import { z } from 'zod';
import { RawAttachmentSchema, Attachment } from './attachment.js';
import { RawUserSchema, User, zSnowflake } from './user.js';

export const RawMessageSchema = z.object({
    id: zSnowflake,
    channel_id: zSnowflake,
    type: z.number().int().optional(),
    content: z.string(),
    author: RawUserSchema,
    timestamp: z.string().optional(),
    edited_timestamp: z.string().nullish(),
    flags: z.number().int().optional(),
    application_id: zSnowflake.optional(),
    attachments: z.array(RawAttachmentSchema).optional(),
});

export type RawMessage = z.infer<typeof RawMessageSchema>;

/** The message a message-context command targets, as found in `resolved.messages`. */
export class PartialMessage {
    readonly id: string;
    readonly channelId: string;
    readonly type: number;
    readonly content: string;
    readonly author: User;
    readonly timestamp?: Date;
    readonly editedTimestamp?: Date;
    readonly flags: number;
    readonly applicationId?: string;
    readonly attachments: readonly Attachment[];

    constructor(data: RawMessage) {
        this.id = data.id;
        this.channelId = data.channel_id;
        this.type = data.type ?? 0;
        this.content = data.content;
        this.author = new User(data.author);
        this.timestamp = data.timestamp ? new Date(data.timestamp) : undefined;
        this.editedTimestamp = data.edited_timestamp ? new Date(data.edited_timestamp) : undefined;
        this.flags = data.flags ?? 0;
        this.applicationId = data.application_id;
        this.attachments = (data.attachments ?? []).map(a => new Attachment(a));
    }

    static parse(data: unknown): PartialMessage {
        return new PartialMessage(RawMessageSchema.parse(data));
    }

    jumpUrl(guildId?: string): string {
        return `https://discord.com/channels/${guildId ?? '@me'}/${this.channelId}/${this.id}`;
    }
}
