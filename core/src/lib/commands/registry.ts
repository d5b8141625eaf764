import type { ApplicationCommandType } from 'discord.js';
import type { APICommandPayload, Command } from './command.js';

function keyOf(type: ApplicationCommandType, name: string): string {
    return `${type}:${name}`;
}

/**
 * Top-level commands keyed by (type, name). Registering the same pair twice
 * keeps the later command.
 */
export class CommandRegistry {
    private readonly commands = new Map<string, Command>();

    register(command: Command): void {
        this.commands.set(keyOf(command.type, command.name), command);
    }

    get(type: ApplicationCommandType, name: string): Command | undefined {
        return this.commands.get(keyOf(type, name));
    }

    get size(): number {
        return this.commands.size;
    }

    all(): Command[] {
        return [...this.commands.values()];
    }

    toJSON(): APICommandPayload[] {
        return this.all().map(c => c.toJSON());
    }
}
