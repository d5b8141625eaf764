/**
 * Declarative option builders.
 *
 * A command lists its parameters as a record of `OptionSpec`s, in the order
 * Discord should display them:
 *
 *   options: {
 *       text: option.string().describe('What to echo').withBounds(new StringBounds({ maxLength: 100 })),
 *       times: option.integer().default(1),
 *       target: option.member().optional(),
 *   }
 *
 * The handler then receives `{ text: string; times: number; target: Member | undefined }`.
 */

import type { ChannelType } from 'discord.js';
import type { Attachment } from '../entities/attachment.js';
import type { Channel } from '../entities/channel.js';
import type { Member } from '../entities/member.js';
import type { Role } from '../entities/role.js';
import type { User } from '../entities/user.js';
import type { LocaleDict } from '../locale/localisation.js';
import type { OptionBounds } from './schema-types.js';

/** Parameter types a handler can declare. */
export type DeclaredType =
    | 'boolean'
    | 'integer'
    | 'float'
    | 'string'
    | 'snowflake'
    | 'user'
    | 'member'
    | 'channel'
    | 'role'
    | 'mentionable'
    | 'attachment'
    | 'enum';

/** A string-valued enumeration: member key → displayed label. */
export type EnumLike = Readonly<Record<string, string>>;

export interface Choice<V extends string | number = string | number> {
    name: string;
    value: V;
    nameLocalisations?: LocaleDict;
}

interface OptionDefinition<V> {
    declared: DeclaredType;
    description?: string;
    optional: boolean;
    hasDefault: boolean;
    defaultValue?: V;
    bounds?: OptionBounds;
    choices?: readonly Choice[];
    enumeration?: EnumLike;
    channelTypes?: readonly ChannelType[];
}

/**
 * One declared parameter. `V` is the value the handler receives, `P` whether it
 * is always present (required, or optional with a default).
 *
 * Specs are immutable; every modifier returns a new spec.
 */
export class OptionSpec<V = unknown, P extends boolean = boolean> {
    readonly present: P;
    private readonly definition: OptionDefinition<V>;

    private constructor(definition: OptionDefinition<V>, present: P) {
        this.definition = definition;
        this.present = present;
    }

    /** @internal */
    static create<V>(declared: DeclaredType, extra: Partial<OptionDefinition<V>> = {}): OptionSpec<V, true> {
        return new OptionSpec<V, true>({ declared, optional: false, hasDefault: false, ...extra }, true);
    }

    get declared(): DeclaredType {
        return this.definition.declared;
    }

    get description(): string | undefined {
        return this.definition.description;
    }

    /** Required unless marked optional or given a default. */
    get required(): boolean {
        return !this.definition.optional && !this.definition.hasDefault;
    }

    get hasDefault(): boolean {
        return this.definition.hasDefault;
    }

    get defaultValue(): V | undefined {
        return this.definition.defaultValue;
    }

    get bounds(): OptionBounds | undefined {
        return this.definition.bounds;
    }

    get choices(): readonly Choice[] | undefined {
        return this.definition.choices;
    }

    get enumeration(): EnumLike | undefined {
        return this.definition.enumeration;
    }

    get channelTypes(): readonly ChannelType[] | undefined {
        return this.definition.channelTypes;
    }

    describe(description: string): OptionSpec<V, P> {
        return new OptionSpec<V, P>({ ...this.definition, description }, this.present);
    }

    /** The handler receives `undefined` when the user leaves the option out. */
    optional(): OptionSpec<V, false> {
        return new OptionSpec<V, false>({ ...this.definition, optional: true, hasDefault: false, defaultValue: undefined }, false);
    }

    /** Not required; the handler receives `value` when the user leaves the option out. */
    default(value: V): OptionSpec<V, true> {
        return new OptionSpec<V, true>({ ...this.definition, optional: true, hasDefault: true, defaultValue: value }, true);
    }

    /** Min/max value or length. Bounds that do not fit the declared type are ignored. */
    withBounds(bounds: OptionBounds): OptionSpec<V, P> {
        return new OptionSpec<V, P>({ ...this.definition, bounds }, this.present);
    }

    withChoices(choices: readonly Choice[]): OptionSpec<V, P> {
        return new OptionSpec<V, P>({ ...this.definition, choices }, this.present);
    }
}

export type AnyOptionSpec = OptionSpec<unknown, boolean>;

export type OptionSpecMap = Record<string, AnyOptionSpec>;

/** The argument object a handler receives for a given option map. */
export type OptionValues<O extends OptionSpecMap> = {
    [K in keyof O]: O[K] extends OptionSpec<infer V, infer P> ? (P extends true ? V : V | undefined) : never;
};

export const option = {
    boolean: () => OptionSpec.create<boolean>('boolean'),
    integer: () => OptionSpec.create<number>('integer'),
    float: () => OptionSpec.create<number>('float'),
    string: () => OptionSpec.create<string>('string'),
    /** A raw ID; sent to Discord as a string option. */
    snowflake: () => OptionSpec.create<string>('snowflake'),
    user: () => OptionSpec.create<User>('user'),
    /** A user option whose handler wants the guild member record. */
    member: () => OptionSpec.create<Member>('member'),
    channel: (...channelTypes: ChannelType[]) =>
        OptionSpec.create<Channel>('channel', channelTypes.length > 0 ? { channelTypes } : {}),
    role: () => OptionSpec.create<Role>('role'),
    /** A user or a role. Guild members are preferred over bare users. */
    mentionable: () => OptionSpec.create<Member | User | Role>('mentionable'),
    attachment: () => OptionSpec.create<Attachment>('attachment'),
    /**
     * Offer the members of a string enumeration as fixed choices: each member's
     * value is the label shown, its key is what Discord sends back. The handler
     * receives the member value.
     */
    enumeration: <E extends EnumLike>(enumeration: E) =>
        OptionSpec.create<E[keyof E]>('enum', { enumeration }),
} as const;
