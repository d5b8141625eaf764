import fp from 'fastify-plugin';
import type { FastifyRequest } from 'fastify';
import { Errors } from '../lib/errors/errors.js';
import { SIGNATURE_HEADER, TIMESTAMP_HEADER } from '../lib/interactions/dispatcher.js';

declare module 'fastify' {
    interface FastifyRequest {
        /** The JSON body exactly as received, for signature verification. */
        rawBody?: Buffer;
    }
    interface FastifyContextConfig {
        public?: boolean;
    }
}

// Keeps JSON bodies as raw bytes: Discord signs the exact body, so it must not
// be re-serialized before verification. Parsing happens after the check.
export default fp(async (fastify) => {
    fastify.removeContentTypeParser('application/json');
    fastify.addContentTypeParser('application/json', { parseAs: 'buffer' }, async (req: FastifyRequest, body: Buffer) => {
        req.rawBody = body;
        return body;
    });

    // Unsigned requests are turned away before any body work.
    // Public route(s) can opt out by setting: config: { public: true }
    fastify.addHook('onRequest', async (req, reply) => {
        if (req.routeOptions?.config?.public === true) return;

        const signature = req.headers[SIGNATURE_HEADER];
        const timestamp = req.headers[TIMESTAMP_HEADER];
        if (typeof signature !== 'string' || typeof timestamp !== 'string') {
            return Errors.badSignature(reply);
        }
    });
});
