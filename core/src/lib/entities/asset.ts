export const CDN_BASE = 'https://cdn.discordapp.com';

export type AssetSize = 16 | 32 | 64 | 128 | 256 | 512 | 1024 | 2048 | 4096;

/** A CDN image addressed by a base path and a hash ("a_" prefixed hashes are animated). */
export class Asset {
    constructor(
        readonly baseUrl: string,
        readonly code: string,
    ) {}

    get animated(): boolean {
        return this.code.startsWith('a_');
    }

    url(options: { animated?: boolean; size?: AssetSize } = {}): string {
        const animated = options.animated ?? this.animated;
        const size = options.size ?? 1024;
        return `${this.baseUrl}/${this.code}.${animated ? 'gif' : 'png'}?size=${size}`;
    }

    toString(): string {
        return this.url();
    }
}

export interface AvatarDecorationData {
    asset: string;
    sku_id?: string | null;
    expires_at?: number | null;
}

export class AvatarDecoration {
    readonly asset: Asset;
    readonly skuId?: string;
    readonly expiresAt?: Date;

    constructor(data: AvatarDecorationData) {
        this.asset = new Asset(`${CDN_BASE}/avatar-decoration-presets`, data.asset);
        this.skuId = data.sku_id ?? undefined;
        this.expiresAt = data.expires_at != null ? new Date(data.expires_at * 1000) : undefined;
    }
}
