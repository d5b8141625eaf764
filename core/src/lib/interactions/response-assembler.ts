import type { RestClient } from '../http/rest-client.js';
import { createLogger } from '../logging/logger.js';
import type { Interaction } from './interaction.js';
import type { CommandResponse, ResponseEnvelope } from './response.js';
import { editOriginalResponse } from './webhooks.js';

const logger = createLogger('Responder');

/**
 * What the HTTP layer sends back: either the reply itself, or nothing because
 * the reply travels as a PATCH after a deferred acknowledgement.
 */
export type AssembledReply =
    | { kind: 'body'; body: ResponseEnvelope }
    | { kind: 'deferred' };

/**
 * Turns a handler's CommandResponse into the reply for its interaction:
 *
 * - fresh, no files: returned inline as the HTTP response body
 * - fresh, with files: deferred, then patched in as multipart
 * - already deferred: patched in
 */
export class ResponseAssembler {
    constructor(private readonly rest: RestClient) {}

    async finish(interaction: Interaction, response: CommandResponse): Promise<AssembledReply> {
        interaction.state.assertCan('responded');

        if (!interaction.deferred && !response.hasFiles) {
            interaction.markResponded();
            return { kind: 'body', body: response.toJSON() };
        }

        if (!interaction.deferred) {
            logger.debug({ interactionId: interaction.id, files: response.files.length }, 'Deferring to upload files');
            await interaction.defer({ ephemeral: response.ephemeral });
        }

        await editOriginalResponse(this.rest, interaction.applicationId, interaction.token, response);
        interaction.markResponded();
        return { kind: 'deferred' };
    }
}
