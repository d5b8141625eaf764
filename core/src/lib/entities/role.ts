import { z } from 'zod';
import { Asset, CDN_BASE } from './asset.js';
import { zSnowflake } from './user.js';

export const RawRoleSchema = z.object({
    id: zSnowflake,
    name: z.string(),
    description: z.string().nullish(),
    color: z.number().int(),
    hoist: z.boolean(),
    icon: z.string().nullish(),
    unicode_emoji: z.string().nullish(),
    position: z.number().int(),
    permissions: z.string(),
    managed: z.boolean(),
    mentionable: z.boolean(),
    flags: z.number().int().optional(),
    tags: z.object({
        bot_id: zSnowflake.optional(),
        integration_id: zSnowflake.optional(),
        subscription_listing_id: zSnowflake.optional(),
        // Discord sends these as `null` when true and omits them when false.
        premium_subscriber: z.null().optional(),
        available_for_purchase: z.null().optional(),
        guild_connections: z.null().optional(),
    }).optional(),
});

export type RawRole = z.infer<typeof RawRoleSchema>;

export interface RoleTags {
    botId?: string;
    integrationId?: string;
    subscriptionListingId?: string;
    premiumSubscriber: boolean;
    availableForPurchase: boolean;
    guildConnections: boolean;
}

export class Role {
    readonly id: string;
    readonly name: string;
    readonly description?: string;
    readonly colour: number;
    readonly hoist: boolean;
    readonly unicodeEmoji?: string;
    readonly position: number;
    readonly permissions: bigint;
    readonly managed: boolean;
    readonly mentionable: boolean;
    readonly flags: number;
    readonly tags: RoleTags;

    private readonly iconHash?: string;

    constructor(data: RawRole) {
        this.id = data.id;
        this.name = data.name;
        this.description = data.description ?? undefined;
        this.colour = data.color;
        this.hoist = data.hoist;
        this.unicodeEmoji = data.unicode_emoji ?? undefined;
        this.position = data.position;
        this.permissions = BigInt(data.permissions);
        this.managed = data.managed;
        this.mentionable = data.mentionable;
        this.flags = data.flags ?? 0;
        this.iconHash = data.icon ?? undefined;

        const tags = data.tags ?? {};
        this.tags = {
            botId: tags.bot_id,
            integrationId: tags.integration_id,
            subscriptionListingId: tags.subscription_listing_id,
            premiumSubscriber: 'premium_subscriber' in tags,
            availableForPurchase: 'available_for_purchase' in tags,
            guildConnections: 'guild_connections' in tags,
        };
    }

    static parse(data: unknown): Role {
        return new Role(RawRoleSchema.parse(data));
    }

    get icon(): Asset | undefined {
        return this.iconHash ? new Asset(`${CDN_BASE}/role-icons/${this.id}`, this.iconHash) : undefined;
    }

    get mention(): string {
        return `<@&${this.id}>`;
    }

    toString(): string {
        return this.mention;
    }
}
