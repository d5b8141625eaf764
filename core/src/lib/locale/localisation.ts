import { Locale } from 'discord.js';

export { Locale };

export const DEFAULT_LOCALE = Locale.EnglishUS;

/** Per-locale strings keyed by Discord locale code (e.g. 'fr', 'es-ES'). */
export type LocaleDict = Partial<Record<Locale, string>>;

type LocalisationKey = 'name' | 'description';

/**
 * Name and description translations for a command or option.
 * A plain `name`/`description` fills the default (en-US) slot.
 */
export class Localisation {
    readonly nameLocalisations: LocaleDict;
    readonly descriptionLocalisations: LocaleDict;

    constructor(init: {
        name?: string;
        description?: string;
        nameLocalisations?: LocaleDict;
        descriptionLocalisations?: LocaleDict;
    } = {}) {
        this.nameLocalisations = { ...init.nameLocalisations };
        this.descriptionLocalisations = { ...init.descriptionLocalisations };
        if (init.name) this.nameLocalisations[DEFAULT_LOCALE] = init.name;
        if (init.description) this.descriptionLocalisations[DEFAULT_LOCALE] = init.description;
    }

    /** The en-US string, else the first translation registered, else undefined. */
    getDefault(key: LocalisationKey): string | undefined {
        const table = key === 'name' ? this.nameLocalisations : this.descriptionLocalisations;
        return table[DEFAULT_LOCALE] ?? Object.values(table)[0];
    }

    toJSON(): { name_localizations: LocaleDict; description_localizations: LocaleDict } {
        return {
            name_localizations: { ...this.nameLocalisations },
            description_localizations: { ...this.descriptionLocalisations },
        };
    }
}
