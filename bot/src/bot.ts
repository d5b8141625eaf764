import { InteractionBot, createLogger } from 'slashhook';
import type { FetchLike } from 'slashhook';
import type { BotConfig } from './config.js';
import { commands } from './commands/index.js';

const logger = createLogger('ExampleBot');

/** Build the bot from validated config with every example command registered. */
export function createBot(config: BotConfig, fetchImpl?: FetchLike): InteractionBot {
    const bot = new InteractionBot({
        applicationId: config.APPLICATION_ID,
        publicKey: config.PUBLIC_KEY,
        uriPath: config.URI_PATH,
        registerCommandsOnStartup: config.REGISTER_COMMANDS_ON_STARTUP,
        fetch: fetchImpl,
        onStartup: async () => {
            logger.info({ commands: bot.registry.size }, 'Example bot ready');
        },
        onShutdown: async () => {
            logger.info('Example bot shutting down');
        },
    });

    for (const command of commands) {
        bot.registerCommand(command);
    }
    return bot;
}
