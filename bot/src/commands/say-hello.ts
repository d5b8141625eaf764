import { ApplicationCommandType, CommandResponse, command } from 'slashhook';

/**
 * "Say hello!" - User context-menu command. Greets the user who was right-clicked.
 */
export const sayHello = command({
    name: 'Say hello!',
    type: ApplicationCommandType.User,
    async handler(interaction) {
        const target = interaction.targetUser();
        return new CommandResponse({ content: `Hey, ${target.mention}! ${interaction.user.displayName} says hello.` });
    },
});
