import { z } from 'zod';
import { Asset, CDN_BASE } from './asset.js';
import { RawUserSchema, User, zSnowflake } from './user.js';

/** Member record as it appears in `resolved.members` (no `user`, no `deaf`/`mute`). */
export const RawPartialMemberSchema = z.object({
    nick: z.string().nullish(),
    avatar: z.string().nullish(),
    banner: z.string().nullish(),
    roles: z.array(zSnowflake),
    joined_at: z.string().nullish(),
    premium_since: z.string().nullish(),
    communication_disabled_until: z.string().nullish(),
    pending: z.boolean().optional(),
    flags: z.number().int().optional(),
    permissions: z.string().optional(),
    deaf: z.boolean().optional(),
    mute: z.boolean().optional(),
});

/** Member record of the invoking user (`interaction.member`), which embeds its user. */
export const RawMemberSchema = RawPartialMemberSchema.extend({
    user: RawUserSchema,
});

export type RawPartialMember = z.infer<typeof RawPartialMemberSchema>;
export type RawMember = z.infer<typeof RawMemberSchema>;

function toDate(value: string | null | undefined): Date | undefined {
    return value ? new Date(value) : undefined;
}

/** A guild member merged with its user record. */
export class Member {
    readonly user: User;
    readonly guildId?: string;
    readonly nick?: string;
    readonly roles: readonly string[];
    readonly joinedAt?: Date;
    readonly premiumSince?: Date;
    readonly communicationDisabledUntil?: Date;
    readonly pending: boolean;
    readonly flags: number;
    /** Permissions in the interaction's channel, when Discord sends them. */
    readonly permissions?: bigint;
    readonly deaf: boolean;
    readonly mute: boolean;

    private readonly avatarHash?: string;
    private readonly bannerHash?: string;

    constructor(data: RawPartialMember, user: User, guildId?: string) {
        this.user = user;
        this.guildId = guildId;
        this.nick = data.nick ?? undefined;
        this.roles = data.roles;
        this.joinedAt = toDate(data.joined_at);
        this.premiumSince = toDate(data.premium_since);
        this.communicationDisabledUntil = toDate(data.communication_disabled_until);
        this.pending = data.pending ?? false;
        this.flags = data.flags ?? 0;
        this.permissions = data.permissions !== undefined ? BigInt(data.permissions) : undefined;
        this.deaf = data.deaf ?? false;
        this.mute = data.mute ?? false;
        this.avatarHash = data.avatar ?? undefined;
        this.bannerHash = data.banner ?? undefined;
    }

    static parse(data: unknown, guildId?: string): Member {
        const raw = RawMemberSchema.parse(data);
        return new Member(raw, new User(raw.user), guildId);
    }

    get id(): string {
        return this.user.id;
    }

    get displayName(): string {
        return this.nick ?? this.user.displayName;
    }

    get mention(): string {
        return this.user.mention;
    }

    /** Guild-specific avatar, if the member set one. */
    get guildAvatar(): Asset | undefined {
        if (!this.avatarHash || !this.guildId) return undefined;
        return new Asset(`${CDN_BASE}/guilds/${this.guildId}/users/${this.id}/avatars`, this.avatarHash);
    }

    get displayAvatar(): Asset {
        return this.guildAvatar ?? this.user.avatar;
    }

    get banner(): Asset | undefined {
        if (!this.bannerHash || !this.guildId) return undefined;
        return new Asset(`${CDN_BASE}/guilds/${this.guildId}/users/${this.id}/banners`, this.bannerHash);
    }

    isTimedOut(now = new Date()): boolean {
        return this.communicationDisabledUntil !== undefined && this.communicationDisabledUntil > now;
    }

    toString(): string {
        return this.mention;
    }
}
