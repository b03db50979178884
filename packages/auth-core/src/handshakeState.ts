import { createHmac, timingSafeEqual } from "node:crypto";

import type { OAuthProvider } from "./types";
import { isOAuthProvider } from "./types";

/**
 * OAuth `state` values carry the CSRF nonce and both redirect targets through the provider round
 * trip. Nothing is stored server-side, so the value is signed to keep the redirect targets from
 * being rewritten by whoever relays it.
 *
 * Layout: `v1.<payload>.<signature>` where payload is base64url(JSON tuple) and signature is
 * base64url(HMAC-SHA256("v1." + payload)). Base64url never contains ".", so the three segments
 * split cleanly whatever the embedded URLs contain. The tuple ends with the issue time in epoch
 * milliseconds; states older than `maxAgeMs`, or issued in the future, are rejected.
 */
export interface HandshakeState {
  readonly nonce: string;
  readonly providerCallbackUrl: string;
  readonly clientRedirectUrl: string;
  readonly provider: OAuthProvider;
  readonly issuedAt: number;
}

export interface HandshakeStateCodecOptions {
  readonly secret: string;
  readonly maxAgeMs?: number;
  readonly clock?: () => number;
}

const DEFAULT_STATE_MAX_AGE_MS = 10 * 60 * 1000;

const CURRENT_VERSION = "v1";
const SEGMENT_SEPARATOR = ".";
const MAX_STATE_LENGTH = 8192;
const ALLOWED_CLOCK_SKEW_MS = 60 * 1000;

type PackedTuple = [string, string, string, string, number];

const isPackedTuple = (value: unknown): value is PackedTuple =>
  Array.isArray(value) &&
  value.length === 5 &&
  value.slice(0, 4).every((entry) => typeof entry === "string") &&
  Number.isSafeInteger(value[4]);

export class HandshakeStateCodec {
  private readonly secret: string;
  private readonly maxAgeMs: number;
  private readonly clock: () => number;

  constructor(options: HandshakeStateCodecOptions) {
    if (!options.secret) {
      throw new Error("Handshake state secret must not be empty");
    }
    this.secret = options.secret;
    this.maxAgeMs = options.maxAgeMs ?? DEFAULT_STATE_MAX_AGE_MS;
    this.clock = options.clock ?? Date.now;
  }

  pack(nonce: string, providerCallbackUrl: string, clientRedirectUrl: string, provider: OAuthProvider): string {
    const tuple: PackedTuple = [nonce, providerCallbackUrl, clientRedirectUrl, provider, this.clock()];
    const payload = Buffer.from(JSON.stringify(tuple), "utf8").toString("base64url");
    const signed = `${CURRENT_VERSION}${SEGMENT_SEPARATOR}${payload}`;
    return `${signed}${SEGMENT_SEPARATOR}${this.sign(signed).toString("base64url")}`;
  }

  unpack(state: string): HandshakeState | null {
    if (!state || state.length > MAX_STATE_LENGTH) {
      return null;
    }
    const segments = state.split(SEGMENT_SEPARATOR);
    if (segments.length !== 3) {
      return null;
    }
    const [version, payload, signature] = segments;
    if (version !== CURRENT_VERSION || !payload || !signature) {
      return null;
    }

    const expected = this.sign(`${version}${SEGMENT_SEPARATOR}${payload}`);
    const provided = Buffer.from(signature, "base64url");
    if (expected.byteLength !== provided.byteLength || !timingSafeEqual(expected, provided)) {
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(Buffer.from(payload, "base64url").toString("utf8"));
    } catch (_error) {
      return null;
    }
    if (!isPackedTuple(decoded)) {
      return null;
    }

    const [nonce, providerCallbackUrl, clientRedirectUrl, provider, issuedAt] = decoded;
    if (!nonce || !isOAuthProvider(provider)) {
      return null;
    }
    const age = this.clock() - issuedAt;
    if (age > this.maxAgeMs || age < -ALLOWED_CLOCK_SKEW_MS) {
      return null;
    }
    return { nonce, providerCallbackUrl, clientRedirectUrl, provider, issuedAt };
  }

  private sign(value: string): Buffer {
    return createHmac("sha256", this.secret).update(value).digest();
  }
}
