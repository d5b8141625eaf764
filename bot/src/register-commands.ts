import { botConfig } from './env.js';
import { createBot } from './bot.js';

async function main() {
    const bot = createBot(botConfig);
    bot.rest.setToken(botConfig.SECRET_KEY);

    console.log(`🌍 Registering ${bot.registry.size} commands globally...`);
    await bot.registerCommands();
    console.log('📝 Commands:', bot.registry.all().map(c => c.name).join(', '));
    console.log('⏳ Global commands may take up to 1 hour to appear in all servers');
}

main().catch(err => {
    console.error(err);
    process.exit(1);
});
