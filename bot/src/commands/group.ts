import { CommandResponse, command, commandGroup } from 'slashhook';

/**
 * /group-name hello - A sub command inside a group. The group itself is never invoked.
 */
export const groupName = commandGroup({
    name: 'group-name',
    description: 'This is the group description',
    subCommands: [
        command({
            name: 'hello',
            description: 'Say hello!',
            async handler() {
                return new CommandResponse({ content: 'Hello, world!' });
            },
        }),
    ],
});
