import { InteractionResponseType, MessageFlags } from 'discord.js';
import type { File } from '../commands/file.js';
import type { APIEmbedPayload, Embed } from '../entities/embed.js';

export { InteractionResponseType, MessageFlags };

export interface AttachmentStub {
    id: number;
    filename: string;
    description?: string;
    spoiler: boolean;
}

export interface MessageData {
    flags?: number;
    content?: string;
    embeds: APIEmbedPayload[];
    attachments: AttachmentStub[];
}

export interface ResponseEnvelope {
    type: InteractionResponseType;
    data: MessageData;
}

export interface CommandResponseInit {
    /** Defaults to a channel message. */
    type?: InteractionResponseType;
    content?: string;
    embeds?: readonly Embed[];
    files?: readonly File[];
    ephemeral?: boolean;
}

/** What a command handler returns. */
export class CommandResponse {
    readonly type: InteractionResponseType;
    readonly content?: string;
    readonly embeds: readonly Embed[];
    readonly files: readonly File[];
    readonly ephemeral: boolean;

    constructor(init: CommandResponseInit = {}) {
        this.type = init.type ?? InteractionResponseType.ChannelMessageWithSource;
        this.content = init.content;
        this.embeds = init.embeds ?? [];
        this.files = init.files ?? [];
        this.ephemeral = init.ephemeral ?? false;
    }

    get hasFiles(): boolean {
        return this.files.length > 0;
    }

    /** Message data; attachment stubs are indexed to match the `files[i]` multipart parts. */
    toData(): MessageData {
        return {
            flags: this.ephemeral ? MessageFlags.Ephemeral : undefined,
            content: this.content,
            embeds: this.embeds.map(e => e.toJSON()),
            attachments: this.files.map((file, id) => ({
                id,
                filename: file.filename,
                description: file.description,
                spoiler: file.spoiler,
            })),
        };
    }

    toJSON(): ResponseEnvelope {
        return { type: this.type, data: this.toData() };
    }
}
