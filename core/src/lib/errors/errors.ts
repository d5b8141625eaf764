/**
 * Unified error shape for ALL non-2xx responses the interaction server sends,
 * plus the typed errors the command pipeline throws.
 *
 * JSON shape:
 * { "error": { "code": "SOME_CODE", "message": "Human-friendly text" } }
 *
 * The one exception is a failed signature check, which answers with the
 * terse body Discord expects: { "error": "Bad request signature" }.
 */

import type { FastifyReply } from 'fastify';

export type ErrorCode =
    | 'BAD_SIGNATURE'
    | 'VALIDATION_ERROR'
    | 'CONFIGURATION_ERROR'
    | 'INVALID_STATE_TRANSITION'
    | 'UNKNOWN_COMMAND'
    | 'UNRESOLVED_REFERENCE'
    | 'REQUEST_FAILED'
    | 'INTERNAL_ERROR';

export interface ApiErrorPayload {
    error: {
        code: ErrorCode;
        message: string;
    };
}

/** Build the error payload (use this in route handlers). */
export function apiError(code: ErrorCode, message: string): ApiErrorPayload {
    return { error: { code, message } };
}

/**
 * Base class for every error the library raises. `code` is stable and safe to
 * switch on; `status` is the HTTP status the server answers with when the
 * error escapes a request.
 */
export class SlashhookError extends Error {
    readonly code: ErrorCode;
    readonly status: number;

    constructor(message: string, code: ErrorCode, status = 500) {
        super(message);
        this.name = new.target.name;
        this.code = code;
        this.status = status;
    }
}

/**
 * Caller mistakes made while building commands or driving an interaction:
 * bad bounds, empty groups, choices mixed with autocomplete, invoking a group.
 */
export class ConfigurationError extends SlashhookError {
    constructor(message: string) {
        super(message, 'CONFIGURATION_ERROR');
    }
}

/** An interaction was deferred or answered twice. */
export class InteractionStateError extends SlashhookError {
    readonly from: string;
    readonly to: string;

    constructor(from: string, to: string) {
        super(`cannot transition interaction from "${from}" to "${to}"`, 'INVALID_STATE_TRANSITION');
        this.from = from;
        this.to = to;
    }
}

/** No registered command (or sub-command, or autocomplete provider) matches the payload. */
export class UnknownCommandError extends SlashhookError {
    constructor(message: string) {
        super(message, 'UNKNOWN_COMMAND', 404);
    }
}

/** The inbound payload does not have the shape of an interaction. */
export class MalformedInteractionError extends SlashhookError {
    constructor(message = 'interaction payload validation failed') {
        super(message, 'VALIDATION_ERROR', 400);
    }
}

/**
 * A reference option (user, member, role, channel, attachment) or an enum
 * choice points at something the payload never resolved.
 */
export class UnresolvedReferenceError extends SlashhookError {
    readonly option: string;

    constructor(option: string, message: string) {
        super(message, 'UNRESOLVED_REFERENCE', 500);
        this.option = option;
    }
}

/**
 * An outbound call to the Discord REST API failed.
 * `platformCode` is Discord's numeric JSON error code when the body carried one.
 */
export class RequestFailedError extends SlashhookError {
    readonly method: string;
    readonly url: string;
    readonly upstreamStatus?: number;
    readonly platformCode?: number;

    constructor(
        message: string,
        details: { method: string; url: string; upstreamStatus?: number; platformCode?: number },
    ) {
        super(message, 'REQUEST_FAILED', 502);
        this.method = details.method;
        this.url = details.url;
        this.upstreamStatus = details.upstreamStatus;
        this.platformCode = details.platformCode;
    }
}

/**
 * Fastify-friendly helper: reply with a status + unified error payload.
 * Usage: return sendError(reply, 404, 'UNKNOWN_COMMAND', 'unknown command "foo"');
 */
export function sendError(
    reply: FastifyReply,
    status: number,
    code: ErrorCode,
    message: string
) {
    return reply.code(status).send(apiError(code, message));
}

/* -------------------------------------------
 * Convenience shorthands for common cases.
 * ------------------------------------------*/
export const Errors = {
    badSignature: (reply: FastifyReply) =>
        reply.code(401).send({ error: 'Bad request signature' }),

    validation: (reply: FastifyReply, message = 'interaction payload validation failed') =>
        sendError(reply, 400, 'VALIDATION_ERROR', message),

    fromError: (reply: FastifyReply, err: SlashhookError) =>
        sendError(reply, err.status, err.code, err.message),

    internal: (reply: FastifyReply, message = 'an internal error occurred') =>
        sendError(reply, 500, 'INTERNAL_ERROR', message),
} as const;
