import { CommandResponse, StringBounds, command, option } from 'slashhook';

/**
 * /echo - Repeat a short piece of text.
 * Discord enforces the length bounds client-side; the handler sees the value as sent.
 */
export const echo = command({
    name: 'echo',
    description: 'Repeat a short piece of text',
    options: {
        text: option.string()
            .describe('Between 3 and 10 characters')
            .withBounds(new StringBounds({ minLength: 3, maxLength: 10 })),
    },
    async handler(_interaction, { text }) {
        return new CommandResponse({ content: `Wow! ${text}` });
    },
});
