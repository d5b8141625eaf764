import { Attachment } from '../entities/attachment.js';
import { channelFromData } from '../entities/channel.js';
import type { Channel } from '../entities/channel.js';
import { Member } from '../entities/member.js';
import { PartialMessage } from '../entities/message.js';
import { Role } from '../entities/role.js';
import { User } from '../entities/user.js';
import { MalformedInteractionError } from '../errors/errors.js';
import type { RawResolved } from './payload.js';

function tableOf<R, T>(raw: Record<string, R> | undefined, build: (value: R, id: string) => T): Map<string, T> {
    const table = new Map<string, T>();
    for (const [id, value] of Object.entries(raw ?? {})) {
        table.set(id, build(value, id));
    }
    return table;
}

/**
 * Lookup tables for everything a request's options reference, built from
 * `data.resolved`. Lives for one request.
 */
export class ResolvedEntities {
    readonly users: ReadonlyMap<string, User>;
    readonly members: ReadonlyMap<string, Member>;
    readonly roles: ReadonlyMap<string, Role>;
    readonly channels: ReadonlyMap<string, Channel>;
    readonly messages: ReadonlyMap<string, PartialMessage>;
    readonly attachments: ReadonlyMap<string, Attachment>;

    constructor(raw: RawResolved = {}, guildId?: string) {
        const users = tableOf(raw.users, data => new User(data));
        this.users = users;
        // Resolved members omit `user`; the matching entry in `users` fills it in.
        this.members = tableOf(raw.members, (data, id) => {
            const user = users.get(id);
            if (!user) {
                throw new MalformedInteractionError(`resolved member ${id} has no matching resolved user`);
            }
            return new Member(data, user, guildId);
        });
        this.roles = tableOf(raw.roles, data => new Role(data));
        this.channels = tableOf(raw.channels, data => channelFromData(data));
        this.messages = tableOf(raw.messages, data => new PartialMessage(data));
        this.attachments = tableOf(raw.attachments, data => new Attachment(data));
    }

    static empty(): ResolvedEntities {
        return new ResolvedEntities();
    }
}
