import {
    ApplicationCommandOptionType,
    ApplicationCommandType,
    ApplicationIntegrationType,
    InteractionContextType,
} from 'discord.js';
import { ConfigurationError } from '../errors/errors.js';
import { Localisation } from '../locale/localisation.js';
import type { LocaleDict } from '../locale/localisation.js';
import type { Interaction } from '../interactions/interaction.js';
import type { CommandResponse } from '../interactions/response.js';
import {
    PLACEHOLDER_DESCRIPTION,
    buildOptionDescriptors,
    defaultLocalisation,
    serializeOption,
} from './option-schema.js';
import type { APIOptionPayload, OptionDescriptor } from './option-schema.js';
import type { Choice, OptionSpecMap, OptionValues } from './options.js';

export { ApplicationCommandType, ApplicationIntegrationType, InteractionContextType };

/**
 * Supplies suggestions for a focused option. `value` is what the user has
 * typed so far; at most 25 of the returned choices are shown.
 */
export type AutocompleteProvider = (interaction: Interaction, value: string | number | boolean) => Promise<readonly Choice[]>;

export const DEFAULT_CONTEXTS: readonly InteractionContextType[] = [
    InteractionContextType.Guild,
    InteractionContextType.BotDM,
    InteractionContextType.PrivateChannel,
];

export const DEFAULT_INTEGRATION_TYPES: readonly ApplicationIntegrationType[] = [
    ApplicationIntegrationType.GuildInstall,
];

interface CommandMetadataInit {
    name: string;
    /** Defaults to a slash (chat input) command. */
    type?: ApplicationCommandType;
    description?: string;
    contexts?: readonly InteractionContextType[];
    integrationTypes?: readonly ApplicationIntegrationType[];
    nameLocalisations?: LocaleDict;
    descriptionLocalisations?: LocaleDict;
}

export interface LeafCommandInit<O extends OptionSpecMap> extends CommandMetadataInit {
    options?: O;
    /** Only slash commands support autocomplete. */
    autocompletes?: { [K in keyof O & string]?: AutocompleteProvider };
    optionLocalisations?: { [K in keyof O & string]?: Localisation };
    /** Defer before the handler runs, for handlers that may exceed Discord's 3 second window. */
    autoDefer?: boolean;
    handler(interaction: Interaction, args: OptionValues<O>): Promise<CommandResponse>;
    subCommands?: undefined;
}

export interface GroupCommandInit extends CommandMetadataInit {
    subCommands: readonly Command[];
    handler?: undefined;
}

export type CommandInit = LeafCommandInit<OptionSpecMap> | GroupCommandInit;

export interface APICommandPayload {
    name: string;
    type: ApplicationCommandType;
    description?: string;
    integration_types: ApplicationIntegrationType[];
    contexts: InteractionContextType[];
    options?: APIOptionPayload[];
    name_localizations: LocaleDict;
    description_localizations: LocaleDict;
}

type Handler = LeafCommandInit<OptionSpecMap>['handler'];

/**
 * A node of the command tree: either an invocable leaf (handler + options) or
 * a group of sub-commands. Built once at startup, read-only afterwards.
 */
export class Command {
    readonly name: string;
    readonly type: ApplicationCommandType;
    readonly contexts: readonly InteractionContextType[];
    readonly integrationTypes: readonly ApplicationIntegrationType[];
    readonly autoDefer: boolean;
    readonly localisation: Localisation;
    readonly optionSpecs: Readonly<OptionSpecMap>;

    private readonly rawDescription?: string;
    private readonly handler?: Handler;
    private readonly autocompletes: ReadonlyMap<string, AutocompleteProvider>;
    private readonly optionLocalisations: Readonly<Record<string, Localisation | undefined>>;
    private readonly children: ReadonlyMap<string, Command>;

    constructor(init: CommandInit) {
        const type = init.type ?? ApplicationCommandType.ChatInput;
        const subCommands = init.subCommands ?? [];

        if (init.handler && subCommands.length > 0) {
            throw new ConfigurationError(`Command "${init.name}" cannot have both a handler and sub commands.`);
        }
        if (!init.handler && subCommands.length === 0) {
            throw new ConfigurationError(`Group command "${init.name}" must have at least one sub command.`);
        }
        if (subCommands.length > 0 && type !== ApplicationCommandType.ChatInput) {
            throw new ConfigurationError(`Only slash commands can have sub commands ("${init.name}").`);
        }

        this.name = init.name;
        this.type = type;
        this.rawDescription = init.description;
        this.contexts = [...new Set(init.contexts ?? DEFAULT_CONTEXTS)];
        this.integrationTypes = [...new Set(init.integrationTypes ?? DEFAULT_INTEGRATION_TYPES)];
        this.localisation = new Localisation({
            nameLocalisations: init.nameLocalisations,
            descriptionLocalisations: init.descriptionLocalisations,
        });

        const children = new Map<string, Command>();
        for (const child of subCommands) {
            if (children.has(child.name)) {
                throw new ConfigurationError(`Group command "${init.name}" has two sub commands named "${child.name}".`);
            }
            if (child.type !== ApplicationCommandType.ChatInput) {
                throw new ConfigurationError(`Sub command "${init.name} ${child.name}" must be a slash command.`);
            }
            children.set(child.name, child);
        }
        this.children = children;

        if (init.handler) {
            const options = init.options ?? {};
            const autocompletes = new Map<string, AutocompleteProvider>();
            for (const [name, provider] of Object.entries(init.autocompletes ?? {})) {
                if (provider) autocompletes.set(name, provider);
            }
            if (autocompletes.size > 0 && type !== ApplicationCommandType.ChatInput) {
                throw new ConfigurationError(`Autocompletes are only supported for slash commands ("${init.name}").`);
            }
            for (const name of autocompletes.keys()) {
                if (!(name in options)) {
                    throw new ConfigurationError(`Command "${init.name}" has an autocomplete for unknown option "${name}".`);
                }
            }
            this.handler = init.handler;
            this.optionSpecs = options;
            this.autocompletes = autocompletes;
            this.optionLocalisations = { ...init.optionLocalisations };
            this.autoDefer = init.autoDefer ?? false;
        } else {
            this.optionSpecs = {};
            this.autocompletes = new Map();
            this.optionLocalisations = {};
            this.autoDefer = false;
        }
    }

    /** Slash commands always carry a description; context-menu commands never do. */
    get description(): string | undefined {
        if (this.type !== ApplicationCommandType.ChatInput) return undefined;
        return this.rawDescription || PLACEHOLDER_DESCRIPTION;
    }

    get isGroup(): boolean {
        return this.children.size > 0;
    }

    get subCommands(): ReadonlyMap<string, Command> {
        return this.children;
    }

    getSubCommand(name: string): Command | undefined {
        return this.children.get(name);
    }

    getAutocomplete(optionName: string): AutocompleteProvider | undefined {
        return this.autocompletes.get(optionName);
    }

    /**
     * Wire option descriptors, derived fresh on every call. Leaves describe
     * their parameters; groups describe their children as sub-commands and
     * sub-command groups.
     */
    options(path: readonly string[] = []): Map<string, OptionDescriptor> {
        const commandPath = [...path, this.name];
        if (!this.isGroup) {
            return buildOptionDescriptors(this.optionSpecs, {
                commandName: commandPath.join(' '),
                autocompletes: new Set(this.autocompletes.keys()),
                optionLocalisations: this.optionLocalisations,
            });
        }

        const descriptors = new Map<string, OptionDescriptor>();
        for (const [name, child] of this.children) {
            const nested = child.options(commandPath);
            if (child.isGroup && nested.size === 0) {
                throw new ConfigurationError(`Sub command group "${[...commandPath, name].join(' ')}" must have sub commands.`);
            }
            const description = child.description ?? PLACEHOLDER_DESCRIPTION;
            descriptors.set(name, {
                name,
                description,
                type: child.isGroup ? ApplicationCommandOptionType.SubcommandGroup : ApplicationCommandOptionType.Subcommand,
                options: nested,
                localisation: child.hasLocalisations() ? child.localisation : defaultLocalisation(name, description),
            });
        }
        return descriptors;
    }

    private hasLocalisations(): boolean {
        return Object.keys(this.localisation.nameLocalisations).length > 0
            || Object.keys(this.localisation.descriptionLocalisations).length > 0;
    }

    /** Run the handler. Groups are never invoked directly. */
    async invoke(interaction: Interaction, args: Record<string, unknown>): Promise<CommandResponse> {
        if (!this.handler) {
            throw new ConfigurationError(`Command "${this.name}" is a group and cannot be directly invoked.`);
        }
        return this.handler(interaction, args);
    }

    toJSON(): APICommandPayload {
        const options = this.options();
        return {
            name: this.name,
            type: this.type,
            description: this.description,
            integration_types: [...this.integrationTypes],
            contexts: [...this.contexts],
            options: options.size > 0 ? [...options.values()].map(serializeOption) : undefined,
            ...this.localisation.toJSON(),
        };
    }
}

/** Define an invocable command; the handler's argument types follow from `options`. */
export function command<O extends OptionSpecMap>(init: LeafCommandInit<O>): Command {
    return new Command(init);
}

/** Define a command whose sub commands (or nested groups) are the invocable units. */
export function commandGroup(init: GroupCommandInit): Command {
    return new Command(init);
}
