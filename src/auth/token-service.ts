/**
 * Token Service - issues and verifies HS256 access/refresh JWTs.
 *
 * Access tokens carry the profile fields routes need (username, role,
 * grade). The middleware still reloads the employee on every request so a
 * deactivated account stops working before its token expires.
 */

import { randomUUID } from "node:crypto";
import * as jose from "jose";
import { z } from "zod";
import { UnauthorizedError } from "../core/errors.js";
import { EmployeeId } from "../types/branded.js";
import { GRADES, ROLES, type Employee, type Grade, type Role } from "../types/claim-contract.js";

// =============================================================================
// § Types
// =============================================================================

export interface TokenServiceConfig {
  secret: string;
  issuer: string;
  accessTokenTtlSeconds: number;
  refreshTokenTtlSeconds: number;
}

export type TokenKind = "access" | "refresh";

export interface TokenClaims {
  sub: EmployeeId;
  username: string;
  role: Role;
  grade: Grade;
  typ: TokenKind;
  iat: number;
  exp: number;
}

export interface TokenPair {
  accessToken: string;
  refreshToken: string;
  /** Access token lifetime in seconds */
  expiresIn: number;
}

const claimsSchema = z.object({
  sub: z.string().min(1),
  username: z.string(),
  role: z.enum(ROLES),
  grade: z.enum(GRADES),
  typ: z.enum(["access", "refresh"]),
  iat: z.number(),
  exp: z.number(),
});

const ALGORITHM = "HS256";

// =============================================================================
// § Service
// =============================================================================

export class TokenService {
  private readonly key: Uint8Array;

  constructor(private readonly config: TokenServiceConfig) {
    this.key = new TextEncoder().encode(config.secret);
  }

  async issuePair(employee: Pick<Employee, "id" | "username" | "role" | "grade">): Promise<TokenPair> {
    const [accessToken, refreshToken] = await Promise.all([
      this.sign(employee, "access", this.config.accessTokenTtlSeconds),
      this.sign(employee, "refresh", this.config.refreshTokenTtlSeconds),
    ]);
    return { accessToken, refreshToken, expiresIn: this.config.accessTokenTtlSeconds };
  }

  /**
   * Verify signature, issuer, expiry and token kind.
   *
   * @throws {UnauthorizedError} for any invalid token
   */
  async verify(token: string, expected: TokenKind): Promise<TokenClaims> {
    let payload: jose.JWTPayload;
    try {
      ({ payload } = await jose.jwtVerify(token, this.key, {
        issuer: this.config.issuer,
        algorithms: [ALGORITHM],
      }));
    } catch (err) {
      if (err instanceof jose.errors.JWTExpired) {
        throw new UnauthorizedError("Token expired");
      }
      if (err instanceof jose.errors.JWSSignatureVerificationFailed) {
        throw new UnauthorizedError("Invalid token signature");
      }
      if (err instanceof jose.errors.JWTClaimValidationFailed) {
        throw new UnauthorizedError(`Token claim validation failed: ${err.message}`);
      }
      throw new UnauthorizedError(
        `Invalid token: ${err instanceof Error ? err.message : String(err)}`
      );
    }

    const parsed = claimsSchema.safeParse(payload);
    if (!parsed.success) {
      throw new UnauthorizedError("Token is missing required claims");
    }
    if (parsed.data.typ !== expected) {
      throw new UnauthorizedError(`Expected a ${expected} token`);
    }
    return { ...parsed.data, sub: EmployeeId(parsed.data.sub) };
  }

  private sign(
    employee: Pick<Employee, "id" | "username" | "role" | "grade">,
    typ: TokenKind,
    ttlSeconds: number
  ): Promise<string> {
    const now = Math.floor(Date.now() / 1000);
    return new jose.SignJWT({
      username: employee.username,
      role: employee.role,
      grade: employee.grade,
      typ,
    })
      .setProtectedHeader({ alg: ALGORITHM })
      .setSubject(employee.id)
      .setIssuer(this.config.issuer)
      .setJti(randomUUID())
      .setIssuedAt(now)
      .setExpirationTime(now + ttlSeconds)
      .sign(this.key);
  }
}
