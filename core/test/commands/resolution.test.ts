import { describe, it, expect } from 'vitest';
import { ApplicationCommandOptionType, ApplicationCommandType, ChannelType } from 'discord.js';
import { command, commandGroup } from '../../src/lib/commands/command.js';
import { buildOptionDescriptor } from '../../src/lib/commands/option-schema.js';
import { option } from '../../src/lib/commands/options.js';
import { CommandRegistry } from '../../src/lib/commands/registry.js';
import { materializeArguments, resolveCommand } from '../../src/lib/commands/resolution.js';
import { StringBounds } from '../../src/lib/commands/schema-types.js';
import { Attachment } from '../../src/lib/entities/attachment.js';
import { Member } from '../../src/lib/entities/member.js';
import { Role } from '../../src/lib/entities/role.js';
import { User } from '../../src/lib/entities/user.js';
import {
  MalformedInteractionError,
  UnknownCommandError,
  UnresolvedReferenceError,
} from '../../src/lib/errors/errors.js';
import { ResolvedEntities } from '../../src/lib/interactions/resolved.js';
import { CommandResponse } from '../../src/lib/interactions/response.js';

const reply = async () => new CommandResponse({ content: 'ok' });

const Fruit = {
  APPLE: 'Apple',
  PEAR: 'Pear',
  PLUM: 'Plum',
} as const;

const TARGET_ID = '700000000000000007';
const ROLE_ID = '800000000000000008';
const CHANNEL_ID = '900000000000000009';
const ATTACHMENT_ID = '110000000000000011';

const resolvedTables = {
  users: {
    [TARGET_ID]: { id: TARGET_ID, username: 'target', discriminator: '0', global_name: null, avatar: null },
  },
  members: {
    [TARGET_ID]: { nick: 'Targe', roles: [ROLE_ID], joined_at: '2024-02-02T00:00:00.000000+00:00', permissions: '8' },
  },
  roles: {
    [ROLE_ID]: {
      id: ROLE_ID, name: 'Helpers', color: 0x00ff00, hoist: false, position: 3,
      permissions: '0', managed: false, mentionable: true,
    },
  },
  channels: {
    [CHANNEL_ID]: { id: CHANNEL_ID, type: ChannelType.GuildText, name: 'general', permissions: '1024' },
  },
  attachments: {
    [ATTACHMENT_ID]: {
      id: ATTACHMENT_ID, filename: 'cat.png', size: 1234, content_type: 'image/png',
      url: 'https://cdn.example.test/cat.png', proxy_url: 'https://media.example.test/cat.png',
    },
  },
};

function registryWith(...commands: ReturnType<typeof command>[]) {
  const registry = new CommandRegistry();
  for (const cmd of commands) registry.register(cmd);
  return registry;
}

describe('resolveCommand', () => {
  it('should resolve a two-level sub command group to its leaf', () => {
    const sub = command({ name: 'sub', options: { x: option.integer() }, handler: reply });
    const registry = registryWith(
      commandGroup({
        name: 'group',
        subCommands: [commandGroup({ name: 'inner', subCommands: [sub] })],
      }),
    );

    const target = resolveCommand(registry, {
      name: 'group',
      type: ApplicationCommandType.ChatInput,
      options: [
        {
          name: 'inner',
          type: ApplicationCommandOptionType.SubcommandGroup,
          options: [{ name: 'sub', type: ApplicationCommandOptionType.Subcommand, options: [{ name: 'x', type: 4, value: 5 }] }],
        },
      ],
    });

    expect(target.command).toBe(sub);
    expect(target.path).toEqual(['group', 'inner', 'sub']);
    expect(Object.fromEntries(target.values)).toEqual({ x: 5 });
  });

  it('should resolve a group whose first option names the leaf', () => {
    const sub = command({ name: 'sub', options: { x: option.integer() }, handler: reply });
    const registry = registryWith(commandGroup({ name: 'group', subCommands: [sub] }));

    const target = resolveCommand(registry, {
      name: 'group',
      type: ApplicationCommandType.ChatInput,
      options: [{ name: 'sub', type: ApplicationCommandOptionType.Subcommand, options: [{ name: 'x', type: 4, value: 5 }] }],
    });

    expect(target.command.name).toBe('sub');
    expect(Object.fromEntries(target.values)).toEqual({ x: 5 });
    expect(target.rawOptions.get('x')).toEqual({ name: 'x', type: 4, value: 5 });
  });

  it('should fail for an unknown top-level command', () => {
    expect(() => resolveCommand(new CommandRegistry(), { name: 'nope', type: 1 })).toThrow(UnknownCommandError);
  });

  it('should distinguish commands by type', () => {
    const registry = registryWith(command({ name: 'Inspect', type: ApplicationCommandType.User, handler: reply }));
    expect(() => resolveCommand(registry, { name: 'Inspect', type: ApplicationCommandType.ChatInput })).toThrow(
      'unknown command "Inspect" (type 1)',
    );
  });

  it('should fail for an unknown sub command', () => {
    const registry = registryWith(commandGroup({ name: 'group', subCommands: [command({ name: 'a', handler: reply })] }));
    expect(() =>
      resolveCommand(registry, { name: 'group', type: 1, options: [{ name: 'b', type: 1 }] }),
    ).toThrow('unknown sub command "group b"');
  });
});

describe('materializeArguments', () => {
  const resolved = new ResolvedEntities(resolvedTables, '300000000000000003');

  it('should pass primitive values through unchanged, ignoring bounds', () => {
    const echo = command({
      name: 'echo',
      options: { text: option.string().withBounds(new StringBounds({ minLength: 3, maxLength: 10 })) },
      handler: reply,
    });
    expect(materializeArguments(echo, new Map([['text', 'hi']]), resolved)).toEqual({ text: 'hi' });
  });

  it('should resolve reference options from the resolved tables', () => {
    const cmd = command({
      name: 'inspect',
      options: {
        user: option.user(),
        member: option.member(),
        role: option.role(),
        channel: option.channel(),
        file: option.attachment(),
      },
      handler: reply,
    });

    const args = materializeArguments(
      cmd,
      new Map([
        ['user', TARGET_ID],
        ['member', TARGET_ID],
        ['role', ROLE_ID],
        ['channel', CHANNEL_ID],
        ['file', ATTACHMENT_ID],
      ]),
      resolved,
    );

    expect(args.user).toBeInstanceOf(User);
    expect(args.member).toBeInstanceOf(Member);
    expect(args.member).toBe(resolved.members.get(TARGET_ID));
    expect(resolved.members.get(TARGET_ID)?.displayName).toBe('Targe');
    expect(args.role).toBeInstanceOf(Role);
    expect(args.channel).toMatchObject({ kind: 'guild', id: CHANNEL_ID, name: 'general' });
    expect(args.file).toBeInstanceOf(Attachment);
  });

  it('should fail when a referenced ID is missing from the resolved tables', () => {
    const cmd = command({ name: 'where', options: { channel: option.channel() }, handler: reply });
    expect(() => materializeArguments(cmd, new Map([['channel', '999999999999999999']]), resolved)).toThrow(
      UnresolvedReferenceError,
    );
    expect(() => materializeArguments(cmd, new Map([['channel', '999999999999999999']]), ResolvedEntities.empty())).toThrow(
      'option "channel" references channel 999999999999999999, which is missing from the resolved channels',
    );
  });

  it('should fail for a member option when only the user was resolved', () => {
    const cmd = command({ name: 'who', options: { target: option.member() }, handler: reply });
    const usersOnly = new ResolvedEntities({ users: resolvedTables.users });
    expect(() => materializeArguments(cmd, new Map([['target', TARGET_ID]]), usersOnly)).toThrow(UnresolvedReferenceError);
  });

  it('should resolve a mentionable to the member, then the user, then the role', () => {
    const cmd = command({ name: 'ping-someone', options: { who: option.mentionable() }, handler: reply });

    expect(materializeArguments(cmd, new Map([['who', TARGET_ID]]), resolved).who).toBe(resolved.members.get(TARGET_ID));

    const usersOnly = new ResolvedEntities({ users: resolvedTables.users });
    expect(materializeArguments(cmd, new Map([['who', TARGET_ID]]), usersOnly).who).toBe(usersOnly.users.get(TARGET_ID));

    expect(materializeArguments(cmd, new Map([['who', ROLE_ID]]), resolved).who).toBe(resolved.roles.get(ROLE_ID));
  });

  it('should fail for a mentionable that is neither a user nor a role', () => {
    const cmd = command({ name: 'ping-someone', options: { who: option.mentionable() }, handler: reply });
    expect(() => materializeArguments(cmd, new Map([['who', CHANNEL_ID]]), resolved)).toThrow(
      `option "who" references ${CHANNEL_ID}, which is neither a resolved user nor role`,
    );
  });

  it('should round-trip every enumeration member through its serialized key', () => {
    const spec = option.enumeration(Fruit);
    const cmd = command({ name: 'fruit', options: { fruit: spec }, handler: reply });
    const descriptor = buildOptionDescriptor('fruit', spec, { commandName: 'fruit', autocompletes: new Set(), optionLocalisations: {} });

    const roundTripped = (descriptor.choices ?? []).map(choice =>
      materializeArguments(cmd, new Map([['fruit', choice.value]]), resolved).fruit,
    );
    expect(roundTripped).toEqual(Object.values(Fruit));
  });

  it('should fail for an unknown enumeration key', () => {
    const cmd = command({ name: 'fruit', options: { fruit: option.enumeration(Fruit) }, handler: reply });
    expect(() => materializeArguments(cmd, new Map([['fruit', 'MANGO']]), resolved)).toThrow(
      'option "fruit" received unknown choice "MANGO"',
    );
  });

  it('should apply defaults and leave optional options undefined', () => {
    const cmd = command({
      name: 'roll',
      options: { sides: option.integer().default(6), label: option.string().optional() },
      handler: reply,
    });
    expect(materializeArguments(cmd, new Map(), resolved)).toEqual({ sides: 6, label: undefined });
  });

  it('should reject a missing required option', () => {
    const cmd = command({ name: 'echo', options: { text: option.string() }, handler: reply });
    expect(() => materializeArguments(cmd, new Map(), resolved)).toThrow(MalformedInteractionError);
  });

  it('should reject an option the command never declared', () => {
    const cmd = command({ name: 'echo', options: { text: option.string() }, handler: reply });
    expect(() => materializeArguments(cmd, new Map([['text', 'a'], ['extra', 'b']]), resolved)).toThrow(
      'command "echo" has no option "extra"',
    );
  });
});
