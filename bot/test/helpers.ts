import { generateKeyPairSync, sign } from 'node:crypto';
import type { FastifyInstance } from 'fastify';
import { vi } from 'vitest';
import type { FetchLike } from 'slashhook';
import type { BotConfig } from '../src/config.js';

export const APP_ID = '100000000000000001';
export const INTERACTION_ID = '200000000000000002';
export const GUILD_ID = '300000000000000003';
export const TOKEN = 'test-interaction-token';
export const API_BASE = 'https://discord.com/api/v10';

export const INVOKER = { id: '600000000000000006', username: 'tester', global_name: 'Tester', avatar: null };

const TIMESTAMP = '1700000000';

export function createSigner() {
  const { publicKey, privateKey } = generateKeyPairSync('ed25519');
  const jwk = publicKey.export({ format: 'jwk' });
  if (!jwk.x) throw new Error('ed25519 key export produced no x coordinate');

  return {
    publicKeyHex: Buffer.from(jwk.x, 'base64url').toString('hex'),
    sign: (timestamp: string, body: string) => sign(null, Buffer.from(timestamp + body), privateKey).toString('hex'),
  };
}

export function testConfig(publicKey: string): BotConfig {
  return {
    APPLICATION_ID: APP_ID,
    PUBLIC_KEY: publicKey,
    SECRET_KEY: 'test-secret',
    PORT: 8080,
    HOST: '127.0.0.1',
    URI_PATH: '/api/interactions',
    REGISTER_COMMANDS_ON_STARTUP: false,
    NODE_ENV: 'test',
    LOG_LEVEL: 'silent',
  };
}

/** A guild interaction as Discord posts it. */
export function interactionPayload(data: Record<string, unknown>, extra: Record<string, unknown> = {}) {
  return {
    id: INTERACTION_ID,
    application_id: APP_ID,
    type: 2,
    token: TOKEN,
    version: 1,
    guild_id: GUILD_ID,
    channel_id: '400000000000000004',
    member: { user: INVOKER, roles: ['700000000000000007'], joined_at: '2024-01-01T00:00:00.000Z', permissions: '0' },
    locale: 'en-US',
    data: { id: '500000000000000005', type: 1, ...data },
    ...extra,
  };
}

/** POST a signed payload to the interactions route. */
export function postSigned(app: FastifyInstance, signer: ReturnType<typeof createSigner>, payload: unknown) {
  const body = JSON.stringify(payload);
  return app.inject({
    method: 'POST',
    url: '/api/interactions',
    headers: {
      'content-type': 'application/json',
      'x-signature-ed25519': signer.sign(TIMESTAMP, body),
      'x-signature-timestamp': TIMESTAMP,
    },
    payload: body,
  });
}

/** fetch stub: `routes` maps a URL to its response, anything else gets 204. */
export function createFetchStub(routes: Record<string, () => Response> = {}) {
  return vi.fn<FetchLike>(async url => routes[url]?.() ?? new Response(null, { status: 204 }));
}
