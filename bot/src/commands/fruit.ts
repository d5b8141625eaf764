import { CommandResponse, command, option } from 'slashhook';
import type { Choice } from 'slashhook';

export const Fruit = {
    APPLE: 'Apple',
    BANANA: 'Banana',
    CHERRY: 'Cherry',
    KIWI: 'Kiwi',
    MANGO: 'Mango',
} as const;

/**
 * /fruit - Fixed choices from an enumeration. Discord sends the key back,
 * the handler receives the label.
 */
export const pickFruit = command({
    name: 'fruit',
    description: 'Pick your favourite fruit',
    options: {
        favourite: option.enumeration(Fruit).describe('Your favourite'),
        amount: option.integer().default(1),
    },
    async handler(_interaction, { favourite, amount }) {
        return new CommandResponse({ content: `${amount} × ${favourite}, coming up.` });
    },
});

export function suggestFruit(typed: string): Choice[] {
    const needle = typed.trim().toLowerCase();
    return Object.values(Fruit)
        .filter(name => name.toLowerCase().includes(needle))
        .map(name => ({ name, value: name.toLowerCase() }));
}

/**
 * /find-fruit - Free text with suggestions while typing.
 */
export const findFruit = command({
    name: 'find-fruit',
    description: 'Search the fruit bowl',
    options: {
        query: option.string().describe('Start typing a fruit'),
    },
    autocompletes: {
        query: async (_interaction, value) => suggestFruit(String(value)),
    },
    async handler(_interaction, { query }) {
        const match = suggestFruit(query)[0];
        return new CommandResponse({
            content: match ? `Found ${match.name}.` : `No fruit matches "${query}".`,
            ephemeral: match === undefined,
        });
    },
});
