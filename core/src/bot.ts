import { Routes } from 'discord.js';
import type { FastifyInstance } from 'fastify';
import { parseBotOptions } from './config.js';
import type { InteractionBotOptions, InteractionBotOptionsInput } from './config.js';
import { command as defineCommand } from './lib/commands/command.js';
import type { Command, LeafCommandInit } from './lib/commands/command.js';
import type { OptionSpecMap } from './lib/commands/options.js';
import { CommandRegistry } from './lib/commands/registry.js';
import { RestClient } from './lib/http/rest-client.js';
import type { FetchLike } from './lib/http/rest-client.js';
import { InteractionDispatcher } from './lib/interactions/dispatcher.js';
import { createLogger } from './lib/logging/logger.js';
import { createInteractionServer } from './server.js';

const logger = createLogger('Bot');

export interface InteractionBotInit extends InteractionBotOptionsInput {
    onStartup?: () => Promise<void>;
    onShutdown?: () => Promise<void>;
    /** Replaces the global fetch for outbound calls. */
    fetch?: FetchLike;
}

export interface StartOptions {
    /** Bot token; needed for command registration. */
    token?: string;
    port?: number;
    host?: string;
}

/**
 * An HTTP-interactions bot: a command registry, the dispatcher serving it and
 * the REST client for deferrals, follow-ups and command registration.
 */
export class InteractionBot {
    readonly options: InteractionBotOptions;
    readonly registry = new CommandRegistry();
    readonly rest: RestClient;
    readonly dispatcher: InteractionDispatcher;

    private readonly onStartup?: () => Promise<void>;
    private readonly onShutdown?: () => Promise<void>;
    private server?: FastifyInstance;

    constructor(init: InteractionBotInit) {
        const { onStartup, onShutdown, fetch, ...options } = init;
        this.options = parseBotOptions(options);
        this.onStartup = onStartup;
        this.onShutdown = onShutdown;
        this.rest = new RestClient({ baseUrl: this.options.apiBaseUrl, fetch });
        this.dispatcher = new InteractionDispatcher({
            publicKey: this.options.publicKey,
            registry: this.registry,
            rest: this.rest,
        });
    }

    /** Define a command and register it in one step. */
    command<O extends OptionSpecMap>(init: LeafCommandInit<O>): Command {
        const command = defineCommand(init);
        this.registerCommand(command);
        return command;
    }

    /** Register a prebuilt command or group. A command with the same type and name is replaced. */
    registerCommand(command: Command): void {
        if (this.registry.get(command.type, command.name)) {
            logger.warn({ command: command.name, type: command.type }, 'Replacing previously registered command');
        }
        this.registry.register(command);
    }

    /** Overwrite the application's global commands with everything registered here. */
    async registerCommands(): Promise<void> {
        const payload = this.registry.toJSON();
        await this.rest.put(Routes.applicationCommands(this.options.applicationId), payload);
        logger.info({ count: payload.length }, 'Registered application commands');
    }

    async createServer(): Promise<FastifyInstance> {
        return createInteractionServer({
            dispatcher: this.dispatcher,
            uriPath: this.options.uriPath,
            onReady: async () => {
                if (this.options.registerCommandsOnStartup) {
                    await this.registerCommands();
                }
                await this.onStartup?.();
            },
            onClose: async () => {
                await this.onShutdown?.();
            },
        });
    }

    async start(options: StartOptions = {}): Promise<FastifyInstance> {
        if (options.token) this.rest.setToken(options.token);

        const server = await this.createServer();
        const address = await server.listen({ port: options.port ?? 8080, host: options.host ?? '0.0.0.0' });
        this.server = server;
        logger.info({ address, uriPath: this.options.uriPath, commands: this.registry.size }, 'Interaction bot listening');
        return server;
    }

    async stop(): Promise<void> {
        await this.server?.close();
        this.server = undefined;
    }
}
