import { z } from 'zod';
import { Asset, AvatarDecoration, CDN_BASE } from './asset.js';

export const zSnowflake = z.string().regex(/^\d{1,20}$/, 'expected a Discord snowflake');

export const RawUserSchema = z.object({
    id: zSnowflake,
    username: z.string(),
    discriminator: z.string().optional(),
    global_name: z.string().nullish(),
    avatar: z.string().nullish(),
    bot: z.boolean().optional(),
    system: z.boolean().optional(),
    public_flags: z.number().int().optional(),
    avatar_decoration_data: z.object({
        asset: z.string(),
        sku_id: z.string().nullish(),
        expires_at: z.number().nullish(),
    }).nullish(),
});

export type RawUser = z.infer<typeof RawUserSchema>;

/** Number of default avatar images Discord serves. */
export const DEFAULT_AVATAR_COUNT = 6;

export class User {
    readonly id: string;
    readonly username: string;
    readonly discriminator: string;
    readonly globalName?: string;
    readonly bot: boolean;
    readonly system: boolean;
    readonly publicFlags: number;

    private readonly avatarHash?: string;
    private readonly decoration?: RawUser['avatar_decoration_data'];

    constructor(data: RawUser) {
        this.id = data.id;
        this.username = data.username;
        this.discriminator = data.discriminator ?? '0';
        this.globalName = data.global_name ?? undefined;
        this.bot = data.bot ?? false;
        this.system = data.system ?? false;
        this.publicFlags = data.public_flags ?? 0;
        this.avatarHash = data.avatar ?? undefined;
        this.decoration = data.avatar_decoration_data;
    }

    static parse(data: unknown): User {
        return new User(RawUserSchema.parse(data));
    }

    /** Global display name, falling back to the username. */
    get displayName(): string {
        return this.globalName ?? this.username;
    }

    get mention(): string {
        return `<@${this.id}>`;
    }

    get defaultAvatar(): Asset {
        // Legacy accounts still carry a discriminator; migrated ones are keyed off the ID.
        const index = this.discriminator === '0'
            ? Number((BigInt(this.id) >> 22n) % BigInt(DEFAULT_AVATAR_COUNT))
            : Number(this.discriminator) % 5;
        return new Asset(`${CDN_BASE}/embed/avatars`, String(index));
    }

    get avatar(): Asset {
        if (!this.avatarHash) return this.defaultAvatar;
        return new Asset(`${CDN_BASE}/avatars/${this.id}`, this.avatarHash);
    }

    get avatarDecoration(): AvatarDecoration | undefined {
        return this.decoration ? new AvatarDecoration(this.decoration) : undefined;
    }

    toString(): string {
        return this.mention;
    }
}
