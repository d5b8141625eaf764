import { ChannelType } from 'discord.js';
import { z } from 'zod';
import { Asset, CDN_BASE } from './asset.js';
import { RawUserSchema, User, zSnowflake } from './user.js';

export { ChannelType };

export const RawChannelSchema = z.object({
    id: zSnowflake,
    type: z.number().int(),
    flags: z.number().int().optional(),
    name: z.string().nullish(),
    guild_id: zSnowflake.optional(),
    parent_id: zSnowflake.nullish(),
    position: z.number().int().optional(),
    topic: z.string().nullish(),
    nsfw: z.boolean().optional(),
    rate_limit_per_user: z.number().int().optional(),
    last_message_id: zSnowflake.nullish(),
    permissions: z.string().optional(),
    recipients: z.array(RawUserSchema).optional(),
    icon: z.string().nullish(),
    owner_id: zSnowflake.optional(),
    thread_metadata: z.object({
        archived: z.boolean(),
        locked: z.boolean().optional(),
        auto_archive_duration: z.number().int().optional(),
        archive_timestamp: z.string().optional(),
    }).optional(),
});

export type RawChannel = z.infer<typeof RawChannelSchema>;

interface ChannelBase {
    id: string;
    type: ChannelType | number;
    flags: number;
    lastMessageId?: string;
    /** Computed permissions of the invoking member, present on resolved channels. */
    permissions?: bigint;
}

export interface GuildChannel extends ChannelBase {
    kind: 'guild';
    name: string;
    guildId?: string;
    parentId?: string;
    position: number;
    topic?: string;
    nsfw: boolean;
    rateLimitPerUser?: number;
}

export interface ThreadChannel extends ChannelBase {
    kind: 'thread';
    name: string;
    guildId?: string;
    parentId?: string;
    archived: boolean;
    locked: boolean;
}

export interface DMChannel extends ChannelBase {
    kind: 'dm';
    recipients: User[];
}

export interface GroupDMChannel extends ChannelBase {
    kind: 'group_dm';
    name?: string;
    ownerId?: string;
    icon?: Asset;
    recipients: User[];
}

/** Channel types this library does not model in detail. */
export interface OtherChannel extends ChannelBase {
    kind: 'other';
    name?: string;
}

export type Channel = GuildChannel | ThreadChannel | DMChannel | GroupDMChannel | OtherChannel;

export type ChannelKind = Channel['kind'];

function kindOf(type: number): ChannelKind {
    switch (type) {
        case ChannelType.GuildText:
        case ChannelType.GuildVoice:
        case ChannelType.GuildCategory:
        case ChannelType.GuildAnnouncement:
        case ChannelType.GuildStageVoice:
        case ChannelType.GuildDirectory:
        case ChannelType.GuildForum:
        case ChannelType.GuildMedia:
            return 'guild';
        case ChannelType.AnnouncementThread:
        case ChannelType.PublicThread:
        case ChannelType.PrivateThread:
            return 'thread';
        case ChannelType.DM:
            return 'dm';
        case ChannelType.GroupDM:
            return 'group_dm';
        default:
            return 'other';
    }
}

/** Build the channel variant for a raw channel payload, keyed by its `type`. */
export function channelFromData(data: RawChannel): Channel {
    const base: ChannelBase = {
        id: data.id,
        type: data.type,
        flags: data.flags ?? 0,
        lastMessageId: data.last_message_id ?? undefined,
        permissions: data.permissions !== undefined ? BigInt(data.permissions) : undefined,
    };

    const kind = kindOf(data.type);
    switch (kind) {
        case 'guild':
            return {
                ...base,
                kind,
                name: data.name ?? '',
                guildId: data.guild_id,
                parentId: data.parent_id ?? undefined,
                position: data.position ?? 0,
                topic: data.topic ?? undefined,
                nsfw: data.nsfw ?? false,
                rateLimitPerUser: data.rate_limit_per_user,
            };
        case 'thread':
            return {
                ...base,
                kind,
                name: data.name ?? '',
                guildId: data.guild_id,
                parentId: data.parent_id ?? undefined,
                archived: data.thread_metadata?.archived ?? false,
                locked: data.thread_metadata?.locked ?? false,
            };
        case 'dm':
            return {
                ...base,
                kind,
                recipients: (data.recipients ?? []).map(r => new User(r)),
            };
        case 'group_dm':
            return {
                ...base,
                kind,
                name: data.name ?? undefined,
                ownerId: data.owner_id,
                icon: data.icon ? new Asset(`${CDN_BASE}/channel-icons/${data.id}`, data.icon) : undefined,
                recipients: (data.recipients ?? []).map(r => new User(r)),
            };
        case 'other':
            return { ...base, kind, name: data.name ?? undefined };
        default: {
            const unreachable: never = kind;
            throw new Error(`unhandled channel kind ${String(unreachable)}`);
        }
    }
}

export function parseChannel(data: unknown): Channel {
    return channelFromData(RawChannelSchema.parse(data));
}

export function channelMention(channel: Pick<Channel, 'id'>): string {
    return `<#${channel.id}>`;
}
