import { CommandResponse, FloatBounds, IntegerBounds, command, option } from 'slashhook';

/**
 * /int-and-float-bounding - Numeric options with min/max values.
 */
export const intAndFloatBounding = command({
    name: 'int-and-float-bounding',
    description: 'Pick a whole number and a decimal within range',
    options: {
        integer: option.integer().withBounds(new IntegerBounds({ minValue: 3, maxValue: 10 })),
        number: option.float().withBounds(new FloatBounds({ minValue: 0.5, maxValue: 2.5 })),
    },
    async handler(_interaction, { integer, number }) {
        return new CommandResponse({ content: `Wow! ${integer} and ${number}` });
    },
});
