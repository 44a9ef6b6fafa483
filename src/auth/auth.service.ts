import jwt, { SignOptions } from 'jsonwebtoken';

import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';
import { Principal, isAddress, isZeroAddress, normalizeAddress } from '../utils/address';

import { IssuedToken, JWTPayload } from './auth.types';

/**
 * Bearer tokens whose subject is the caller principal.
 * Holding a token for an address is what it means to act as that address.
 */
export class AuthService {
  private readonly reserved = new Set<Principal>();

  constructor(
    private readonly secret: string = config.jwt.secret,
    private readonly issuer: string = config.jwt.issuer
  ) {}

  /**
   * Addresses the system acts as on its own (the exchange reserve).
   * No bearer token is issued or accepted for them.
   */
  reserve(principal: string): void {
    this.reserved.add(normalizeAddress(principal, 'principal'));
  }

  isReserved(principal: string): boolean {
    return this.reserved.has(principal.toLowerCase());
  }

  issueToken(principal: string, expiresIn: string = config.jwt.expiresIn): IssuedToken {
    const subject = normalizeAddress(principal, 'principal');
    if (isZeroAddress(subject)) {
      throw ApiError.zeroAddress('Tokens cannot be issued for the zero address');
    }
    if (this.reserved.has(subject)) {
      throw ApiError.unauthorized(`${subject} is a system account and cannot act through the API`);
    }

    const options: SignOptions = {
      subject,
      issuer: this.issuer,
      expiresIn: expiresIn as jwt.SignOptions['expiresIn'],
    };

    return {
      accessToken: jwt.sign({}, this.secret, options),
      principal: subject,
      expiresIn,
    };
  }

  verifyToken(token: string): JWTPayload {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, { issuer: this.issuer });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw ApiError.tokenExpired();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw ApiError.invalidToken();
      }
      throw ApiError.invalidToken('Token verification failed');
    }

    if (typeof decoded === 'string' || !isAddress(decoded.sub) || isZeroAddress(decoded.sub)) {
      throw ApiError.invalidToken('Token subject must be a principal address');
    }
    if (this.isReserved(decoded.sub)) {
      throw ApiError.unauthorized(`${decoded.sub.toLowerCase()} is a system account and cannot act through the API`);
    }

    return {
      sub: decoded.sub.toLowerCase(),
      iss: decoded.iss,
      iat: decoded.iat,
      exp: decoded.exp,
    };
  }
}

export const authService = new AuthService();
