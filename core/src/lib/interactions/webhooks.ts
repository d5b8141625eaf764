import { InteractionResponseType, MessageFlags, Routes } from 'discord.js';
import type { RestClient } from '../http/rest-client.js';
import type { CommandResponse } from './response.js';

export interface DeferOptions {
    ephemeral?: boolean;
    /**
     * `true` (default): "thinking…" placeholder, later patched into the reply.
     * `false`: acknowledge without a placeholder message.
     */
    withMessage?: boolean;
}

/** Deferred acknowledgement body: the response type and, for ephemeral replies, the flag. */
export function deferralBody(options: DeferOptions = {}): { type: InteractionResponseType; data?: { flags: number } } {
    const type = options.withMessage === false
        ? InteractionResponseType.DeferredMessageUpdate
        : InteractionResponseType.DeferredChannelMessageWithSource;
    return options.ephemeral ? { type, data: { flags: MessageFlags.Ephemeral } } : { type };
}

export async function sendDeferral(rest: RestClient, interactionId: string, token: string, options: DeferOptions = {}): Promise<void> {
    await rest.post(Routes.interactionCallback(interactionId, token), deferralBody(options));
}

/** Replace the deferred placeholder. Ephemerality was fixed at defer time, so `flags` is not sent. */
export async function editOriginalResponse(rest: RestClient, applicationId: string, token: string, response: CommandResponse): Promise<void> {
    const { flags: _flags, ...data } = response.toData();
    await rest.patch(Routes.webhookMessage(applicationId, token, '@original'), data, response.files);
}

/** Post an additional message for an interaction; usable with only the application id and token. */
export async function sendFollowup(rest: RestClient, applicationId: string, token: string, response: CommandResponse): Promise<void> {
    await rest.post(Routes.webhook(applicationId, token), response.toData(), response.files);
}
