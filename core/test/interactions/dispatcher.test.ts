import { describe, it, expect, vi } from 'vitest';
import { command, commandGroup } from '../../src/lib/commands/command.js';
import { option } from '../../src/lib/commands/options.js';
import { CommandRegistry } from '../../src/lib/commands/registry.js';
import { StringBounds } from '../../src/lib/commands/schema-types.js';
import { MalformedInteractionError, UnknownCommandError } from '../../src/lib/errors/errors.js';
import { InteractionDispatcher } from '../../src/lib/interactions/dispatcher.js';
import { CommandResponse } from '../../src/lib/interactions/response.js';
import {
  INTERACTION_ID,
  TOKEN,
  commandPayload,
  createFetchStub,
  createRest,
  createSigner,
  pingPayload,
} from '../helpers/fixtures.js';

const TIMESTAMP = '1700000000';

function setup() {
  const signer = createSigner();
  const stub = createFetchStub();
  const registry = new CommandRegistry();
  const dispatcher = new InteractionDispatcher({ publicKey: signer.publicKeyHex, registry, rest: createRest(stub.fetch) });

  const signed = (payload: unknown) => {
    const rawBody = JSON.stringify(payload);
    return { rawBody, timestamp: TIMESTAMP, signature: signer.sign(TIMESTAMP, rawBody) };
  };

  return { registry, dispatcher, signed, ...stub };
}

describe('InteractionDispatcher', () => {
  it('should reject an unsigned request with 401 before parsing', async () => {
    const { dispatcher } = setup();
    const result = await dispatcher.dispatch({ rawBody: 'not even json' });
    expect(result).toEqual({ status: 401, body: { error: 'Bad request signature' } });
  });

  it('should reject a bad signature', async () => {
    const { dispatcher, signed } = setup();
    const request = signed(pingPayload());
    const result = await dispatcher.dispatch({ ...request, rawBody: request.rawBody.replace('"type":1', '"type":2') });
    expect(result.status).toBe(401);
  });

  it('should answer a ping with a pong', async () => {
    const { dispatcher, signed } = setup();
    expect(await dispatcher.dispatch(signed(pingPayload()))).toEqual({ status: 200, body: { type: 1 } });
  });

  it('should pass a bounded string through unchanged to the handler', async () => {
    const { registry, dispatcher, signed } = setup();
    const handler = vi.fn(async (_interaction: unknown, args: { text: string }) => new CommandResponse({ content: args.text }));
    registry.register(command({
      name: 'echo',
      options: { text: option.string().withBounds(new StringBounds({ minLength: 3, maxLength: 10 })) },
      handler,
    }));

    const result = await dispatcher.dispatch(signed(commandPayload({
      name: 'echo',
      options: [{ name: 'text', type: 3, value: 'hi' }],
    })));

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0]?.[1]).toEqual({ text: 'hi' });
    expect(result).toEqual({
      status: 200,
      body: { type: 4, data: { flags: undefined, content: 'hi', embeds: [], attachments: [] } },
    });
  });

  it('should route to a sub command', async () => {
    const { registry, dispatcher, signed } = setup();
    registry.register(commandGroup({
      name: 'math',
      subCommands: [
        command({
          name: 'double',
          options: { n: option.integer() },
          handler: async (_interaction, { n }) => new CommandResponse({ content: String(n * 2) }),
        }),
      ],
    }));

    const result = await dispatcher.dispatch(signed(commandPayload({
      name: 'math',
      options: [{ name: 'double', type: 1, options: [{ name: 'n', type: 4, value: 21 }] }],
    })));

    expect(result.status === 200 && 'data' in result.body ? result.body.data : undefined).toMatchObject({ content: '42' });
  });

  it('should defer before the handler runs for auto-defer commands', async () => {
    const { registry, dispatcher, signed, calls } = setup();
    const order: string[] = [];
    registry.register(command({
      name: 'slow',
      autoDefer: true,
      handler: async interaction => {
        order.push(interaction.state.current);
        return new CommandResponse({ content: 'finally' });
      },
    }));

    const result = await dispatcher.dispatch(signed(commandPayload({ name: 'slow' })));

    expect(result).toEqual({ status: 202 });
    expect(order).toEqual(['deferred']);
    expect(calls().map(c => c.method)).toEqual(['POST', 'PATCH']);
    expect(calls()[0]?.url).toBe(`https://discord.test/api/v10/interactions/${INTERACTION_ID}/${TOKEN}/callback`);
    expect(calls()[1]?.json).toEqual({ content: 'finally', embeds: [], attachments: [] });
  });

  it('should answer autocomplete requests', async () => {
    const { registry, dispatcher, signed } = setup();
    registry.register(command({
      name: 'search',
      options: { query: option.string() },
      autocompletes: { query: async (_interaction, value) => [{ name: `${String(value)}!`, value: String(value) }] },
      handler: async () => new CommandResponse({ content: 'unused' }),
    }));

    const result = await dispatcher.dispatch(signed(commandPayload(
      { name: 'search', options: [{ name: 'query', type: 3, value: 'ab', focused: true }] },
      { type: 4 },
    )));

    expect(result).toEqual({
      status: 200,
      body: { type: 8, data: { choices: [{ name: 'ab!', value: 'ab', name_localizations: undefined }] } },
    });
  });

  it('should raise UnknownCommandError for an unregistered command', async () => {
    const { dispatcher, signed } = setup();
    await expect(dispatcher.dispatch(signed(commandPayload({ name: 'ghost' })))).rejects.toThrow(UnknownCommandError);
  });

  it('should propagate handler errors unmodified', async () => {
    const { registry, dispatcher, signed } = setup();
    const boom = new Error('handler exploded');
    registry.register(command({ name: 'fail', handler: async () => { throw boom; } }));

    await expect(dispatcher.dispatch(signed(commandPayload({ name: 'fail' })))).rejects.toBe(boom);
  });

  it('should reject a signed body that is not an interaction', async () => {
    const { dispatcher, signed } = setup();
    await expect(dispatcher.dispatch(signed({ hello: 'world' }))).rejects.toThrow(MalformedInteractionError);
  });
});
