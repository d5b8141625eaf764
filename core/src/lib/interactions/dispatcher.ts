import { InteractionResponseType, InteractionType } from 'discord.js';
import { runAutocomplete } from '../commands/autocomplete.js';
import type { AutocompleteEnvelope } from '../commands/autocomplete.js';
import type { CommandRegistry } from '../commands/registry.js';
import { materializeArguments, resolveCommand } from '../commands/resolution.js';
import { verifySignature } from '../crypto/signature.js';
import { MalformedInteractionError, UnknownCommandError } from '../errors/errors.js';
import type { RestClient } from '../http/rest-client.js';
import { createLogger } from '../logging/logger.js';
import { Interaction } from './interaction.js';
import { parseInteraction } from './payload.js';
import { ResponseAssembler } from './response-assembler.js';
import type { ResponseEnvelope } from './response.js';

const logger = createLogger('Dispatcher');

export const SIGNATURE_HEADER = 'x-signature-ed25519';
export const TIMESTAMP_HEADER = 'x-signature-timestamp';

export interface InboundRequest {
    /** The body exactly as received; the signature covers these bytes. */
    rawBody: Buffer | string;
    signature?: string;
    timestamp?: string;
}

export type DispatchResult =
    | { status: 200; body: { type: InteractionResponseType.Pong } | ResponseEnvelope | AutocompleteEnvelope }
    | { status: 202 }
    | { status: 401; body: { error: 'Bad request signature' } };

export interface DispatcherOptions {
    publicKey: string;
    registry: CommandRegistry;
    rest: RestClient;
}

function decodeJson(rawBody: Buffer | string): unknown {
    try {
        return JSON.parse(rawBody.toString());
    } catch {
        throw new MalformedInteractionError('request body is not valid JSON');
    }
}

/**
 * Entry point for one inbound webhook call: signature check, then ping,
 * autocomplete or command. Errors from resolution and handlers propagate to
 * the caller untouched.
 */
export class InteractionDispatcher {
    private readonly publicKey: string;
    private readonly registry: CommandRegistry;
    private readonly rest: RestClient;
    private readonly assembler: ResponseAssembler;

    constructor(options: DispatcherOptions) {
        this.publicKey = options.publicKey;
        this.registry = options.registry;
        this.rest = options.rest;
        this.assembler = new ResponseAssembler(options.rest);
    }

    verify(req: InboundRequest): boolean {
        if (!req.signature || !req.timestamp) return false;
        const body = typeof req.rawBody === 'string' ? Buffer.from(req.rawBody) : req.rawBody;
        const message = Buffer.concat([Buffer.from(req.timestamp), body]);
        return verifySignature(this.publicKey, req.signature, message);
    }

    async dispatch(req: InboundRequest): Promise<DispatchResult> {
        if (!this.verify(req)) {
            logger.warn({ hasSignature: Boolean(req.signature), hasTimestamp: Boolean(req.timestamp) }, 'Rejected request with bad signature');
            return { status: 401, body: { error: 'Bad request signature' } };
        }

        const raw = parseInteraction(decodeJson(req.rawBody));

        if (raw.type === InteractionType.Ping) {
            return { status: 200, body: { type: InteractionResponseType.Pong } };
        }

        if (raw.type !== InteractionType.ApplicationCommand && raw.type !== InteractionType.ApplicationCommandAutocomplete) {
            throw new UnknownCommandError(`no handler for interaction type ${raw.type}`);
        }
        if (!raw.data) {
            throw new MalformedInteractionError('command interaction carries no data');
        }

        const interaction = new Interaction(raw, this.rest);
        const target = resolveCommand(this.registry, raw.data);

        if (raw.type === InteractionType.ApplicationCommandAutocomplete) {
            return { status: 200, body: await runAutocomplete(interaction, target) };
        }

        const args = materializeArguments(target.command, target.values, interaction.resolved);
        logger.debug({ command: target.path.join(' '), interactionId: interaction.id, userId: interaction.user.id }, 'Dispatching command');

        if (target.command.autoDefer) {
            await interaction.defer();
        }

        const response = await target.command.invoke(interaction, args);
        const reply = await this.assembler.finish(interaction, response);
        return reply.kind === 'body' ? { status: 200, body: reply.body } : { status: 202 };
    }
}
