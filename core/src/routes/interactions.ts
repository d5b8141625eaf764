import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import { SIGNATURE_HEADER, TIMESTAMP_HEADER } from '../lib/interactions/dispatcher.js';
import type { InteractionDispatcher } from '../lib/interactions/dispatcher.js';

export interface InteractionRouteOptions {
    uriPath: string;
    dispatcher: InteractionDispatcher;
}

function header(req: FastifyRequest, name: string): string | undefined {
    const value = req.headers[name];
    return typeof value === 'string' ? value : undefined;
}

const interactionRoutes: FastifyPluginAsync<InteractionRouteOptions> = async (app, opts) => {
    /**
     * POST <uriPath>
     * Discord's interactions endpoint: pings, autocompletes and commands.
     */
    app.post(opts.uriPath, async (req, reply) => {
        const result = await opts.dispatcher.dispatch({
            rawBody: req.rawBody ?? Buffer.alloc(0),
            signature: header(req, SIGNATURE_HEADER),
            timestamp: header(req, TIMESTAMP_HEADER),
        });

        // The reply went out as a PATCH after a deferred acknowledgement.
        if (result.status === 202) {
            return reply.code(202).send();
        }
        return reply.code(result.status).send(result.body);
    });

    app.route({
        method: 'GET',
        url: '/health',
        config: { public: true },
        handler: async () => ({
            ok: true,
            time: new Date().toISOString(),
        }),
    });
};

export default interactionRoutes;
