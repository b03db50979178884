import jwt from "jsonwebtoken";

import type { AccessTokenClaims, IdentityId, PermissionSet } from "@keyrelay/auth-core";

export type Clock = () => number;

export interface TokenServiceOptions {
  readonly secret: string;
  readonly issuer: string;
  readonly audience: string;
  readonly accessTokenMinutes: number;
  /** Milliseconds since the epoch. Defaults to `Date.now`. */
  readonly clock?: Clock;
}

export interface AccessTokenSubject {
  readonly id: IdentityId;
  readonly email: string;
  readonly username: string;
  readonly isAdmin: boolean;
  readonly permissions: PermissionSet;
}

export interface MintedAccessToken {
  readonly token: string;
  readonly claims: AccessTokenClaims;
  /** Seconds until the token expires. */
  readonly expiresIn: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const toAccessClaims = (decoded: unknown): AccessTokenClaims | null => {
  if (!isRecord(decoded) || decoded.type !== "access") {
    return null;
  }
  const { sub, email, username, is_admin, permissions, iat, exp } = decoded;
  if (
    typeof sub !== "string" ||
    sub.length === 0 ||
    typeof email !== "string" ||
    typeof username !== "string" ||
    typeof is_admin !== "boolean" ||
    !isRecord(permissions) ||
    typeof iat !== "number" ||
    typeof exp !== "number"
  ) {
    return null;
  }
  return { sub, email, username, is_admin, permissions, type: "access", iat, exp };
};

/**
 * Signs and verifies HS256 access tokens. Issuer, audience and the `type` discriminator are
 * checked on every verification so tokens minted for another purpose never pass.
 */
export class TokenService {
  private readonly options: TokenServiceOptions;
  private readonly clock: Clock;

  constructor(options: TokenServiceOptions) {
    this.options = options;
    this.clock = options.clock ?? Date.now;
  }

  get accessTokenLifetimeSeconds(): number {
    return this.options.accessTokenMinutes * 60;
  }

  mint(subject: AccessTokenSubject): MintedAccessToken {
    const issuedAtSeconds = Math.floor(this.clock() / 1000);
    const expiresIn = this.accessTokenLifetimeSeconds;

    const claims: AccessTokenClaims = {
      sub: subject.id,
      email: subject.email,
      username: subject.username,
      is_admin: subject.isAdmin,
      permissions: subject.permissions,
      type: "access",
      iat: issuedAtSeconds,
      exp: issuedAtSeconds + expiresIn
    };

    const token = jwt.sign({ ...claims }, this.options.secret, {
      algorithm: "HS256",
      issuer: this.options.issuer,
      audience: this.options.audience
    });

    return { token, claims, expiresIn };
  }

  verify(token: string): AccessTokenClaims | null {
    if (!token) {
      return null;
    }
    try {
      const decoded = jwt.verify(token, this.options.secret, {
        algorithms: ["HS256"],
        issuer: this.options.issuer,
        audience: this.options.audience,
        clockTimestamp: Math.floor(this.clock() / 1000)
      });
      return toAccessClaims(decoded);
    } catch (_error) {
      return null;
    }
  }
}
