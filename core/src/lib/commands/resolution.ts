import { ApplicationCommandOptionType } from 'discord.js';
import { MalformedInteractionError, UnknownCommandError, UnresolvedReferenceError } from '../errors/errors.js';
import type { RawCommandData, RawCommandOption } from '../interactions/payload.js';
import type { ResolvedEntities } from '../interactions/resolved.js';
import type { Command } from './command.js';
import { effectiveType, wireTypeOf } from './option-schema.js';
import type { AnyOptionSpec } from './options.js';
import type { CommandRegistry } from './registry.js';

export type RawOptionValue = NonNullable<RawCommandOption['value']>;

export interface ResolvedCommand {
    /** The leaf that will handle the request. */
    command: Command;
    /** Names from the top-level command down to the leaf. */
    path: string[];
    /** Leaf options by name, as sent (autocomplete looks for `focused` here). */
    rawOptions: Map<string, RawCommandOption>;
    /** Leaf option values by name, as sent. */
    values: Map<string, RawOptionValue>;
}

/**
 * Find the leaf command a payload targets. Groups are descended through the
 * first option, whose nested options become the working list.
 */
export function resolveCommand(registry: CommandRegistry, data: Pick<RawCommandData, 'name' | 'type' | 'options'>): ResolvedCommand {
    const root = registry.get(data.type, data.name);
    if (!root) {
        throw new UnknownCommandError(`unknown command "${data.name}" (type ${data.type})`);
    }

    let node = root;
    let options = data.options ?? [];
    const path = [root.name];

    while (node.isGroup) {
        const first = options.at(0);
        const child = first ? node.getSubCommand(first.name) : undefined;
        if (!first || !child) {
            throw new UnknownCommandError(`unknown sub command "${[...path, first?.name ?? '<none>'].join(' ')}"`);
        }
        node = child;
        path.push(child.name);
        options = first.options ?? [];
    }

    const rawOptions = new Map<string, RawCommandOption>();
    const values = new Map<string, RawOptionValue>();
    for (const option of options) {
        rawOptions.set(option.name, option);
        if (option.value !== undefined) values.set(option.name, option.value);
    }

    return { command: node, path, rawOptions, values };
}

function referenceId(name: string, value: RawOptionValue): string {
    if (typeof value !== 'string') {
        throw new MalformedInteractionError(`option "${name}" should carry an ID, got ${typeof value}`);
    }
    return value;
}

function lookup<T>(table: ReadonlyMap<string, T>, name: string, id: string, what: string): T {
    const entity = table.get(id);
    if (entity === undefined) {
        throw new UnresolvedReferenceError(name, `option "${name}" references ${what} ${id}, which is missing from the resolved ${what}s`);
    }
    return entity;
}

function materializeOne(name: string, spec: AnyOptionSpec, value: RawOptionValue, resolved: ResolvedEntities): unknown {
    const declared = effectiveType(spec);
    const wireType = wireTypeOf(declared);

    switch (wireType) {
        case ApplicationCommandOptionType.String: {
            if (!spec.enumeration) return value;
            const key = String(value);
            if (!Object.hasOwn(spec.enumeration, key)) {
                throw new UnresolvedReferenceError(name, `option "${name}" received unknown choice "${key}"`);
            }
            return spec.enumeration[key];
        }
        case ApplicationCommandOptionType.Integer:
        case ApplicationCommandOptionType.Number:
        case ApplicationCommandOptionType.Boolean:
            return value;
        case ApplicationCommandOptionType.User: {
            const id = referenceId(name, value);
            return declared === 'member'
                ? lookup(resolved.members, name, id, 'member')
                : lookup(resolved.users, name, id, 'user');
        }
        case ApplicationCommandOptionType.Channel:
            return lookup(resolved.channels, name, referenceId(name, value), 'channel');
        case ApplicationCommandOptionType.Role:
            return lookup(resolved.roles, name, referenceId(name, value), 'role');
        case ApplicationCommandOptionType.Attachment:
            return lookup(resolved.attachments, name, referenceId(name, value), 'attachment');
        case ApplicationCommandOptionType.Mentionable: {
            const id = referenceId(name, value);
            const entity = resolved.members.get(id) ?? resolved.users.get(id) ?? resolved.roles.get(id);
            if (!entity) {
                throw new UnresolvedReferenceError(name, `option "${name}" references ${id}, which is neither a resolved user nor role`);
            }
            return entity;
        }
        case ApplicationCommandOptionType.Subcommand:
        case ApplicationCommandOptionType.SubcommandGroup:
            throw new MalformedInteractionError(`option "${name}" is a sub command, not a value`);
        default: {
            const unreachable: never = wireType;
            throw new MalformedInteractionError(`option "${name}" has unsupported type ${String(unreachable)}`);
        }
    }
}

/**
 * Turn raw option values into handler arguments: references become resolved
 * entities, enumeration keys become members, absent options take their
 * default. Values are not re-checked against bounds.
 */
export function materializeArguments(
    command: Command,
    values: ReadonlyMap<string, RawOptionValue>,
    resolved: ResolvedEntities,
): Record<string, unknown> {
    for (const name of values.keys()) {
        if (!(name in command.optionSpecs)) {
            throw new UnknownCommandError(`command "${command.name}" has no option "${name}"`);
        }
    }

    const args: Record<string, unknown> = {};
    for (const [name, spec] of Object.entries(command.optionSpecs)) {
        const value = values.get(name);
        if (value === undefined) {
            if (spec.required) {
                throw new MalformedInteractionError(`required option "${name}" of command "${command.name}" is missing`);
            }
            args[name] = spec.defaultValue;
            continue;
        }
        args[name] = materializeOne(name, spec, value, resolved);
    }
    return args;
}
