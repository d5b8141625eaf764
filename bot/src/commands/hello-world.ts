import { CommandResponse, Localisation, Locale, command, option } from 'slashhook';

export const helloWorld = command({
    name: 'hello-world',
    description: 'Say hello in your language',
    nameLocalisations: {
        [Locale.EnglishUS]: 'hello-world',
        [Locale.French]: 'bonjour-le-monde',
        [Locale.SpanishES]: 'hola-mundo',
    },
    options: {
        parameter: option.string(),
    },
    optionLocalisations: {
        parameter: new Localisation({ description: 'This is a described parameter.' }),
    },
    async handler(interaction) {
        const greeting = GREETINGS.get(interaction.locale ?? Locale.EnglishUS) ?? 'Hello, world!';
        return new CommandResponse({ content: greeting });
    },
});

const GREETINGS = new Map<Locale, string>([
    [Locale.French, 'Bonjour, le monde !'],
    [Locale.SpanishES, '¡Hola, mundo!'],
]);
