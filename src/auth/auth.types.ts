import { Request } from 'express';

import { Principal } from '../utils/address';

export interface JWTPayload {
  sub: Principal;
  iss?: string;
  iat?: number;
  exp?: number;
}

export interface IssuedToken {
  accessToken: string;
  principal: Principal;
  expiresIn: string;
}

export interface AuthRequest extends Request {
  principal?: Principal;
}
