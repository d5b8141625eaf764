/**
 * Shared test fixtures: an in-memory Ed25519 key pair, interaction payload
 * builders and a fetch stub that records outbound calls.
 */

import { generateKeyPairSync, sign } from 'node:crypto';
import { vi } from 'vitest';
import type { FetchLike } from '../../src/lib/http/rest-client.js';
import { RestClient } from '../../src/lib/http/rest-client.js';
import { Interaction } from '../../src/lib/interactions/interaction.js';
import { parseInteraction } from '../../src/lib/interactions/payload.js';

export const APP_ID = '100000000000000001';
export const INTERACTION_ID = '200000000000000002';
export const GUILD_ID = '300000000000000003';
export const CHANNEL_ID = '400000000000000004';
export const COMMAND_ID = '500000000000000005';
export const TOKEN = 'test-interaction-token';

export const INVOKER = {
  id: '600000000000000006',
  username: 'tester',
  discriminator: '0',
  global_name: 'Tester',
  avatar: null,
};

// ============================================================================
// Signing
// ============================================================================

export function createSigner() {
  const { publicKey, privateKey } = generateKeyPairSync('ed25519');
  const jwk = publicKey.export({ format: 'jwk' });
  if (!jwk.x) throw new Error('ed25519 key export produced no x coordinate');

  return {
    publicKeyHex: Buffer.from(jwk.x, 'base64url').toString('hex'),
    sign(timestamp: string, body: string): string {
      return sign(null, Buffer.from(timestamp + body), privateKey).toString('hex');
    },
  };
}

// ============================================================================
// Payloads
// ============================================================================

export interface CommandDataInit {
  name: string;
  type?: number;
  options?: unknown[];
  resolved?: Record<string, unknown>;
  target_id?: string;
}

/** A guild slash-command invocation as Discord posts it. */
export function commandPayload(data: CommandDataInit, extra: Record<string, unknown> = {}) {
  return {
    id: INTERACTION_ID,
    application_id: APP_ID,
    type: 2,
    token: TOKEN,
    version: 1,
    guild_id: GUILD_ID,
    channel_id: CHANNEL_ID,
    member: {
      user: INVOKER,
      roles: [],
      joined_at: '2024-01-01T00:00:00.000000+00:00',
      permissions: '2048',
      deaf: false,
      mute: false,
    },
    locale: 'en-US',
    data: { id: COMMAND_ID, type: 1, ...data },
    ...extra,
  };
}

export function pingPayload() {
  return { id: INTERACTION_ID, application_id: APP_ID, type: 1, token: TOKEN, version: 1 };
}

// ============================================================================
// Outbound HTTP
// ============================================================================

export interface RecordedCall {
  url: string;
  method: string;
  /** JSON body, or the decoded `payload_json` part of a multipart body. */
  json: unknown;
  /** Present for multipart bodies. */
  form?: FormData;
}

/** fetch stub answering every call with `status` (204 by default) and recording it. */
export function createFetchStub(status = 204, body?: unknown) {
  const fetch = vi.fn<FetchLike>(async () =>
    new Response(body === undefined ? null : JSON.stringify(body), {
      status,
      headers: body === undefined ? undefined : { 'content-type': 'application/json' },
    }),
  );

  const calls = (): RecordedCall[] =>
    fetch.mock.calls.map(([url, init]) => {
      const method = init.method ?? 'GET';
      if (init.body instanceof FormData) {
        const payload = init.body.get('payload_json');
        return { url, method, json: typeof payload === 'string' ? JSON.parse(payload) : undefined, form: init.body };
      }
      return { url, method, json: typeof init.body === 'string' ? JSON.parse(init.body) : undefined };
    });

  return { fetch, calls };
}

export function createRest(fetch: FetchLike): RestClient {
  return new RestClient({ baseUrl: 'https://discord.test/api/v10', fetch });
}

export function createInteraction(payload: unknown, rest: RestClient): Interaction {
  return new Interaction(parseInteraction(payload), rest);
}
