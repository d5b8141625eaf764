import { botConfig } from './env.js';
import { createLogger } from 'slashhook';
import { createBot } from './bot.js';

const logger = createLogger('ExampleBot');

async function main() {
    const bot = createBot(botConfig);

    await bot.start({ token: botConfig.SECRET_KEY, port: botConfig.PORT, host: botConfig.HOST });

    const shutdown = (signal: string) => {
        logger.info({ signal }, 'Received shutdown signal');
        bot.stop()
            .then(() => process.exit(0))
            .catch(err => {
                logger.error({ err }, 'Error during shutdown');
                process.exit(1);
            });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(err => {
    logger.fatal({ err }, 'Failed to start example bot');
    process.exit(1);
});
