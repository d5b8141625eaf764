import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import signedBodyPlugin from './plugins/signed-body.js';
import interactionRoutes from './routes/interactions.js';
import { Errors, SlashhookError } from './lib/errors/errors.js';
import type { InteractionDispatcher } from './lib/interactions/dispatcher.js';
import { createLogger } from './lib/logging/logger.js';

const logger = createLogger('Server');

export interface InteractionServerOptions {
    dispatcher: InteractionDispatcher;
    uriPath: string;
    /** Runs once the server is ready, before it accepts requests. */
    onReady?: () => Promise<void>;
    onClose?: () => Promise<void>;
}

/** Build the Fastify app serving the interactions endpoint. Call `listen()` or `inject()` on it. */
export async function createInteractionServer(options: InteractionServerOptions): Promise<FastifyInstance> {
    const app = Fastify({
        logger: { level: process.env.LOG_LEVEL || 'info' },
    });

    app.setErrorHandler((err, req, reply) => {
        if (err instanceof SlashhookError) {
            if (err.status >= 500) {
                req.log.error({ err, code: err.code }, 'Interaction failed');
            } else {
                req.log.warn({ code: err.code, message: err.message }, 'Interaction rejected');
            }
            return Errors.fromError(reply, err);
        }
        if (err.statusCode !== undefined && err.statusCode < 500) {
            return Errors.validation(reply, err.message);
        }
        req.log.error({ err }, 'Unhandled error');
        return Errors.internal(reply);
    });

    await app.register(signedBodyPlugin);
    await app.register(interactionRoutes, { uriPath: options.uriPath, dispatcher: options.dispatcher });

    const { onReady, onClose } = options;
    if (onReady) {
        app.addHook('onReady', async () => {
            await onReady();
        });
    }
    if (onClose) {
        app.addHook('onClose', async () => {
            await onClose();
        });
    }

    logger.debug({ uriPath: options.uriPath }, 'Interaction server built');
    return app;
}
