/**
 * Request signing for authenticated REST calls.
 *
 * signature = hex(HMAC-SHA256(secret, verb + path + nonce + body))
 *
 * `path` is the full request path including the API prefix and, for reads,
 * the query string. `body` is the JSON body for writes and empty for reads.
 */

import { createHmac } from "node:crypto";

export type Signer = (verb: string, path: string, nonce: number, body: string) => string;

export interface NonceSource {
  /** Next nonce; strictly greater than every earlier one */
  next: () => number;
}

export interface Credentials {
  apiKey: string;
  apiSecret: string;
}

export const createSigner =
  (secret: string): Signer =>
  (verb, path, nonce, body) =>
    createHmac("sha256", secret).update(`${verb}${path}${nonce}${body}`).digest("hex");

/**
 * Wall-clock milliseconds, ratcheted so that calls within one millisecond
 * or after the clock steps backwards still increase.
 */
export const createNonceSource = (now: () => number = Date.now): NonceSource => {
  let last = 0;
  return {
    next: () => {
      last = Math.max(now(), last + 1);
      return last;
    },
  };
};

export const createSignedHeaders = (
  credentials: Credentials,
  nonces: NonceSource,
): ((verb: string, path: string, body: string) => Record<string, string>) => {
  const sign = createSigner(credentials.apiSecret);
  return (verb, path, body) => {
    const nonce = nonces.next();
    return {
      "api-key": credentials.apiKey,
      "api-nonce": String(nonce),
      "api-signature": sign(verb, path, nonce, body),
    };
  };
};
