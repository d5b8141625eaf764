import { InteractionResponseType } from 'discord.js';
import { UnknownCommandError } from '../errors/errors.js';
import type { Interaction } from '../interactions/interaction.js';
import { MAX_CHOICES, serializeChoice } from './option-schema.js';
import type { APIChoicePayload } from './option-schema.js';
import type { ResolvedCommand } from './resolution.js';

export interface AutocompleteEnvelope {
    type: InteractionResponseType.ApplicationCommandAutocompleteResult;
    data: { choices: APIChoicePayload[] };
}

/** Ask the focused option's provider for suggestions. */
export async function runAutocomplete(interaction: Interaction, target: ResolvedCommand): Promise<AutocompleteEnvelope> {
    const focused = [...target.rawOptions.values()].find(o => o.focused);
    if (!focused) {
        throw new UnknownCommandError(`autocomplete for "${target.path.join(' ')}" has no focused option`);
    }

    const provider = target.command.getAutocomplete(focused.name);
    if (!provider) {
        throw new UnknownCommandError(`option "${focused.name}" of "${target.path.join(' ')}" has no autocomplete`);
    }

    const choices = await provider(interaction, focused.value ?? '');
    return {
        type: InteractionResponseType.ApplicationCommandAutocompleteResult,
        data: { choices: choices.slice(0, MAX_CHOICES).map(serializeChoice) },
    };
}
