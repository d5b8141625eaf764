// Imported before anything from slashhook, whose logger reads the environment on load.
import { exportLoggingEnv, loadBotConfig } from './config.js';

export const botConfig = loadBotConfig();
exportLoggingEnv(botConfig);
