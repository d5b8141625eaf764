import { ApplicationCommandType, InteractionType, Locale } from 'discord.js';
import type { Channel } from '../entities/channel.js';
import { channelFromData } from '../entities/channel.js';
import { Member } from '../entities/member.js';
import type { PartialMessage } from '../entities/message.js';
import { User } from '../entities/user.js';
import { InteractionStateError, MalformedInteractionError, UnresolvedReferenceError } from '../errors/errors.js';
import type { RestClient } from '../http/rest-client.js';
import type { RawInteraction } from './payload.js';
import { ResolvedEntities } from './resolved.js';
import type { CommandResponse } from './response.js';
import { sendDeferral, sendFollowup } from './webhooks.js';
import type { DeferOptions } from './webhooks.js';

export { InteractionType };

export type InteractionPhase = 'fresh' | 'deferred' | 'responded';

const ALLOWED: Record<InteractionPhase, readonly InteractionPhase[]> = {
    fresh: ['deferred', 'responded'],
    deferred: ['responded'],
    responded: [],
};

/** fresh → deferred → responded, or fresh → responded. Anything else is a caller bug. */
export class InteractionState {
    private phase: InteractionPhase = 'fresh';

    get current(): InteractionPhase {
        return this.phase;
    }

    canTransition(to: InteractionPhase): boolean {
        return ALLOWED[this.phase].includes(to);
    }

    assertCan(to: InteractionPhase): void {
        if (!this.canTransition(to)) {
            throw new InteractionStateError(this.phase, to);
        }
    }

    transition(to: InteractionPhase): void {
        this.assertCan(to);
        this.phase = to;
    }

    /** Undo a transition whose request failed. No-op once the state has moved on. */
    rollback(from: InteractionPhase, to: InteractionPhase): void {
        if (this.phase === from) this.phase = to;
    }
}

const LOCALES: readonly Locale[] = Object.values(Locale);

/** Unknown locale codes map to undefined. */
function toLocale(value: string | undefined): Locale | undefined {
    return LOCALES.find(l => l === value);
}

/**
 * One inbound interaction. Holds the caller's identity, the resolved entities
 * and the reply state; discarded once the request completes.
 */
export class Interaction {
    readonly id: string;
    readonly applicationId: string;
    readonly type: InteractionType;
    readonly token: string;
    readonly user: User;
    readonly member?: Member;
    readonly guildId?: string;
    readonly channelId?: string;
    readonly channel?: Channel;
    readonly locale?: Locale;
    readonly guildLocale?: Locale;
    readonly commandType?: ApplicationCommandType;
    /** The user or message a context-menu command was used on. */
    readonly targetId?: string;
    readonly resolved: ResolvedEntities;
    readonly state = new InteractionState();

    private readonly rest: RestClient;

    constructor(raw: RawInteraction, rest: RestClient) {
        this.id = raw.id;
        this.applicationId = raw.application_id;
        this.type = raw.type;
        this.token = raw.token;
        this.guildId = raw.guild_id;
        this.channelId = raw.channel_id ?? raw.channel?.id;
        this.channel = raw.channel ? channelFromData(raw.channel) : undefined;
        this.locale = toLocale(raw.locale);
        this.guildLocale = toLocale(raw.guild_locale);
        this.commandType = raw.data?.type;
        this.targetId = raw.data?.target_id;
        this.rest = rest;

        // Guild invocations carry `member` (with an embedded user); DMs carry `user`.
        if (raw.member) {
            this.member = new Member(raw.member, new User(raw.member.user), raw.guild_id);
            this.user = this.member.user;
        } else if (raw.user) {
            this.user = new User(raw.user);
        } else {
            throw new MalformedInteractionError('interaction carries neither member nor user');
        }

        this.resolved = new ResolvedEntities(raw.data?.resolved, raw.guild_id);
    }

    get deferred(): boolean {
        return this.state.current === 'deferred';
    }

    get responded(): boolean {
        return this.state.current === 'responded';
    }

    /**
     * Acknowledge now and reply later. The state moves to deferred before the
     * request goes out, so an overlapping or repeated defer never reaches
     * Discord. A failed request puts the interaction back to fresh.
     */
    async defer(options: DeferOptions = {}): Promise<void> {
        this.state.transition('deferred');
        try {
            await sendDeferral(this.rest, this.id, this.token, options);
        } catch (err) {
            this.state.rollback('deferred', 'fresh');
            throw err;
        }
    }

    /** @internal Called once the reply went out in the HTTP response or as a patch. */
    markResponded(): void {
        this.state.transition('responded');
    }

    /** Post another message. Does not touch the reply state and can be repeated. */
    async followup(response: CommandResponse): Promise<void> {
        await sendFollowup(this.rest, this.applicationId, this.token, response);
    }

    /** Target of a user context-menu command. */
    targetUser(): User {
        const user = this.targetId ? this.resolved.users.get(this.targetId) : undefined;
        if (!user) throw new UnresolvedReferenceError('target', `target user ${this.targetId ?? '<none>'} is not in the resolved users`);
        return user;
    }

    /** Target member of a user context-menu command; undefined outside guilds. */
    targetMember(): Member | undefined {
        return this.targetId ? this.resolved.members.get(this.targetId) : undefined;
    }

    /** Target of a message context-menu command. */
    targetMessage(): PartialMessage {
        const message = this.targetId ? this.resolved.messages.get(this.targetId) : undefined;
        if (!message) throw new UnresolvedReferenceError('target', `target message ${this.targetId ?? '<none>'} is not in the resolved messages`);
        return message;
    }
}
