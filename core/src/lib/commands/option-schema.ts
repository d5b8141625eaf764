import { ApplicationCommandOptionType } from 'discord.js';
import type { ChannelType } from 'discord.js';
import { ConfigurationError } from '../errors/errors.js';
import { Localisation } from '../locale/localisation.js';
import type { LocaleDict } from '../locale/localisation.js';
import type { AnyOptionSpec, Choice, DeclaredType, OptionSpecMap } from './options.js';

export { ApplicationCommandOptionType };

/** Discord shows at most this many choices (fixed or autocompleted). */
export const MAX_CHOICES = 25;

/** Description sent when none was given; Discord rejects empty descriptions on slash commands. */
export const PLACEHOLDER_DESCRIPTION = '--';

const WIRE_TYPES: Partial<Record<DeclaredType, ApplicationCommandOptionType>> = {
    boolean: ApplicationCommandOptionType.Boolean,
    integer: ApplicationCommandOptionType.Integer,
    float: ApplicationCommandOptionType.Number,
    string: ApplicationCommandOptionType.String,
    user: ApplicationCommandOptionType.User,
    member: ApplicationCommandOptionType.User,
    attachment: ApplicationCommandOptionType.Attachment,
    channel: ApplicationCommandOptionType.Channel,
    role: ApplicationCommandOptionType.Role,
    mentionable: ApplicationCommandOptionType.Mentionable,
};

/**
 * The type a declared parameter is dispatched on. Enumerations are sent as
 * their string keys.
 */
export function effectiveType(spec: AnyOptionSpec): DeclaredType {
    return spec.declared === 'enum' ? 'string' : spec.declared;
}

/** Declared type → wire tag; anything missing from the table travels as a string. */
export function wireTypeOf(declared: DeclaredType): ApplicationCommandOptionType {
    return WIRE_TYPES[declared] ?? ApplicationCommandOptionType.String;
}

export interface OptionDescriptor {
    name: string;
    description: string;
    type: ApplicationCommandOptionType;
    /** Omitted for sub-commands and sub-command groups. */
    required?: boolean;
    autocomplete?: boolean;
    choices?: readonly Choice[];
    minValue?: number;
    maxValue?: number;
    minLength?: number;
    maxLength?: number;
    channelTypes?: readonly ChannelType[];
    /** Only for sub-commands and sub-command groups. */
    options?: ReadonlyMap<string, OptionDescriptor>;
    localisation: Localisation;
}

export interface OptionSchemaContext {
    /** Command path used in error messages, e.g. "settings colour". */
    commandName: string;
    autocompletes: ReadonlySet<string>;
    optionLocalisations: Readonly<Record<string, Localisation | undefined>>;
}

/** Default localisation: the plain name and description under en-US. */
export function defaultLocalisation(name: string, description: string): Localisation {
    return new Localisation({ name, description });
}

function enumChoices(enumeration: Readonly<Record<string, string>>): Choice<string>[] {
    return Object.entries(enumeration).map(([key, label]) => ({ name: label, value: key }));
}

type Bounds = Pick<OptionDescriptor, 'minValue' | 'maxValue' | 'minLength' | 'maxLength'>;

function boundsFor(spec: AnyOptionSpec, declared: DeclaredType): Bounds | undefined {
    const bounds = spec.bounds;
    if (!bounds) return undefined;
    switch (bounds.kind) {
        case 'integer':
            return declared === 'integer' || declared === 'float'
                ? { minValue: bounds.minValue, maxValue: bounds.maxValue }
                : undefined;
        case 'float':
            return declared === 'float' ? { minValue: bounds.minValue, maxValue: bounds.maxValue } : undefined;
        case 'string':
            return declared === 'string' ? { minLength: bounds.minLength, maxLength: bounds.maxLength } : undefined;
    }
}

/**
 * Derive the wire descriptor for one declared parameter.
 * Pure: calling it twice yields equal descriptors.
 */
export function buildOptionDescriptor(name: string, spec: AnyOptionSpec, ctx: OptionSchemaContext): OptionDescriptor {
    const declared = effectiveType(spec);
    const where = `option "${name}" of command "${ctx.commandName}"`;

    const choices = spec.enumeration ? enumChoices(spec.enumeration) : spec.choices;
    if (choices && choices.length > MAX_CHOICES) {
        throw new ConfigurationError(`${where} has ${choices.length} choices; Discord allows at most ${MAX_CHOICES}`);
    }

    const bounds = boundsFor(spec, declared);
    if (bounds && choices) {
        throw new ConfigurationError(`${where} cannot declare both bounds and choices`);
    }

    const autocomplete = ctx.autocompletes.has(name);
    if (autocomplete && choices) {
        throw new ConfigurationError(`${where} cannot declare both choices and an autocomplete provider`);
    }

    const localiser = ctx.optionLocalisations[name];
    const description = spec.description ?? localiser?.getDefault('description') ?? PLACEHOLDER_DESCRIPTION;

    return {
        name,
        description,
        type: wireTypeOf(declared),
        required: spec.required,
        autocomplete,
        choices,
        ...bounds,
        channelTypes: declared === 'channel' ? spec.channelTypes : undefined,
        localisation: localiser ?? defaultLocalisation(name, description),
    };
}

/** Ordered name → descriptor map, in declaration order. */
export function buildOptionDescriptors(specs: OptionSpecMap, ctx: OptionSchemaContext): Map<string, OptionDescriptor> {
    const descriptors = new Map<string, OptionDescriptor>();
    for (const [name, spec] of Object.entries(specs)) {
        descriptors.set(name, buildOptionDescriptor(name, spec, ctx));
    }
    return descriptors;
}

export interface APIChoicePayload {
    name: string;
    value: string | number;
    name_localizations?: LocaleDict;
}

export interface APIOptionPayload {
    name: string;
    description: string;
    type: ApplicationCommandOptionType;
    required?: boolean;
    autocomplete?: boolean;
    options?: APIOptionPayload[];
    choices?: APIChoicePayload[];
    min_value?: number;
    max_value?: number;
    min_length?: number;
    max_length?: number;
    channel_types?: ChannelType[];
    name_localizations: LocaleDict;
    description_localizations: LocaleDict;
}

export function serializeChoice(choice: Choice): APIChoicePayload {
    return {
        name: choice.name,
        value: choice.value,
        name_localizations: choice.nameLocalisations,
    };
}

function isContainer(type: ApplicationCommandOptionType): boolean {
    return type === ApplicationCommandOptionType.Subcommand || type === ApplicationCommandOptionType.SubcommandGroup;
}

export function serializeOption(descriptor: OptionDescriptor): APIOptionPayload {
    const container = isContainer(descriptor.type);
    return {
        name: descriptor.name,
        description: descriptor.description,
        type: descriptor.type,
        required: container ? undefined : descriptor.required,
        autocomplete: container ? undefined : descriptor.autocomplete || undefined,
        options: descriptor.options && descriptor.options.size > 0
            ? [...descriptor.options.values()].map(serializeOption)
            : undefined,
        choices: descriptor.choices?.map(serializeChoice),
        min_value: descriptor.minValue,
        max_value: descriptor.maxValue,
        min_length: descriptor.minLength,
        max_length: descriptor.maxLength,
        channel_types: descriptor.channelTypes ? [...descriptor.channelTypes] : undefined,
        ...descriptor.localisation.toJSON(),
    };
}
