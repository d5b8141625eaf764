import { describe, it, expect, vi } from 'vitest';
import { InteractionResponseType } from 'discord.js';
import { runAutocomplete } from '../../src/lib/commands/autocomplete.js';
import { command } from '../../src/lib/commands/command.js';
import { option } from '../../src/lib/commands/options.js';
import { CommandRegistry } from '../../src/lib/commands/registry.js';
import { resolveCommand } from '../../src/lib/commands/resolution.js';
import { UnknownCommandError } from '../../src/lib/errors/errors.js';
import { CommandResponse } from '../../src/lib/interactions/response.js';
import { commandPayload, createFetchStub, createInteraction, createRest } from '../helpers/fixtures.js';

const reply = async () => new CommandResponse({ content: 'ok' });

function setup(provider = vi.fn(async (_interaction: unknown, value: string | number | boolean) =>
  Array.from({ length: 30 }, (_, i) => ({ name: `${String(value)}-${i}`, value: `v${i}` })),
)) {
  const registry = new CommandRegistry();
  registry.register(command({
    name: 'search',
    options: { query: option.string(), page: option.integer().optional() },
    autocompletes: { query: provider },
    handler: reply,
  }));
  const interaction = createInteraction(commandPayload({ name: 'search' }, { type: 4 }), createRest(createFetchStub().fetch));
  return { registry, interaction, provider };
}

describe('runAutocomplete', () => {
  it('should call the focused option provider and cap the choices at 25', async () => {
    const { registry, interaction, provider } = setup();
    const target = resolveCommand(registry, {
      name: 'search',
      type: 1,
      options: [{ name: 'query', type: 3, value: 'ca', focused: true }],
    });

    const result = await runAutocomplete(interaction, target);

    expect(provider).toHaveBeenCalledWith(interaction, 'ca');
    expect(result.type).toBe(InteractionResponseType.ApplicationCommandAutocompleteResult);
    expect(result.data.choices).toHaveLength(25);
    expect(result.data.choices[0]).toEqual({ name: 'ca-0', value: 'v0', name_localizations: undefined });
  });

  it('should fail when no option is focused', async () => {
    const { registry, interaction } = setup();
    const target = resolveCommand(registry, { name: 'search', type: 1, options: [{ name: 'query', type: 3, value: 'ca' }] });
    await expect(runAutocomplete(interaction, target)).rejects.toThrow(UnknownCommandError);
  });

  it('should fail when the focused option has no provider', async () => {
    const { registry, interaction } = setup();
    const target = resolveCommand(registry, {
      name: 'search',
      type: 1,
      options: [{ name: 'page', type: 4, value: 2, focused: true }],
    });
    await expect(runAutocomplete(interaction, target)).rejects.toThrow('option "page" of "search" has no autocomplete');
  });
});
