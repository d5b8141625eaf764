import { z } from 'zod';
import { zSnowflake } from './user.js';

export const RawAttachmentSchema = z.object({
    id: zSnowflake,
    filename: z.string(),
    description: z.string().optional(),
    content_type: z.string().optional(),
    size: z.number().int(),
    url: z.string(),
    proxy_url: z.string(),
    height: z.number().int().nullish(),
    width: z.number().int().nullish(),
    ephemeral: z.boolean().optional(),
    duration_secs: z.number().optional(),
    placeholder: z.string().optional(),
    placeholder_version: z.number().int().optional(),
});

export type RawAttachment = z.infer<typeof RawAttachmentSchema>;

/** A file a user uploaded through an attachment option. */
export class Attachment {
    readonly id: string;
    readonly filename: string;
    readonly description?: string;
    readonly contentType?: string;
    readonly size: number;
    readonly url: string;
    readonly proxyUrl: string;
    readonly height?: number;
    readonly width?: number;
    readonly ephemeral: boolean;

    constructor(data: RawAttachment) {
        this.id = data.id;
        this.filename = data.filename;
        this.description = data.description;
        this.contentType = data.content_type;
        this.size = data.size;
        this.url = data.url;
        this.proxyUrl = data.proxy_url;
        this.height = data.height ?? undefined;
        this.width = data.width ?? undefined;
        this.ephemeral = data.ephemeral ?? false;
    }

    static parse(data: unknown): Attachment {
        return new Attachment(RawAttachmentSchema.parse(data));
    }

    get isImage(): boolean {
        return this.contentType?.startsWith('image/') ?? false;
    }
}
