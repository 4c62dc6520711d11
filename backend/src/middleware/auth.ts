import { createHash, timingSafeEqual } from 'crypto';
import type { NextFunction, Request, Response } from 'express';

import { env } from '../config/env';

export type AuthUser = {
  id: string;
  role: 'service' | 'wallet';
  tokenType: 'service' | 'user';
};

const unauthorized = (res: Response, message: string) => res.status(401).json({ error: message });

const safeEqual = (provided: string, expected: string) => {
  const left = Buffer.from(provided);
  const right = Buffer.from(expected);
  return left.length === right.length && timingSafeEqual(left, right);
};

const extractBearerToken = (req: Request): string | undefined => {
  const header = req.get('authorization');
  if (!header?.toLowerCase().startsWith('bearer ')) {
    return undefined;
  }
  return header.slice('bearer '.length);
};

const signatureFor = (address: string) =>
  createHash('sha256').update(address).update(env.userTokenSecret).digest('hex');

/** Wallet token: `<address>.<sha256(address + secret)>`. */
export const signUserToken = (address: string) => `${address}.${signatureFor(address)}`;

const isAuthUser = (value: unknown): value is AuthUser =>
  typeof value === 'object' &&
  value !== null &&
  'id' in value &&
  typeof value.id === 'string' &&
  'tokenType' in value &&
  (value.tokenType === 'service' || value.tokenType === 'user');

export const authenticatedUser = (res: Response): AuthUser => {
  const user: unknown = res.locals.authUser;
  if (!isAuthUser(user)) {
    throw new Error('request is not authenticated');
  }
  return user;
};

export const requireServiceToken = (req: Request, res: Response, next: NextFunction) => {
  const provided = extractBearerToken(req) ?? req.get('x-api-key');
  if (!provided) {
    return unauthorized(res, 'service token is required');
  }
  if (!safeEqual(provided, env.serviceApiToken)) {
    return unauthorized(res, 'invalid service token');
  }
  res.locals.authUser = { id: 'service', role: 'service', tokenType: 'service' } satisfies AuthUser;
  return next();
};

export const requireUserToken = (req: Request, res: Response, next: NextFunction) => {
  const token = extractBearerToken(req);
  if (!token) {
    return unauthorized(res, 'user token is required');
  }
  const separator = token.lastIndexOf('.');
  const address = separator > 0 ? token.slice(0, separator) : '';
  const signature = separator > 0 ? token.slice(separator + 1) : '';
  if (!address || !signature) {
    return unauthorized(res, 'malformed user token');
  }
  if (!safeEqual(signature, signatureFor(address))) {
    return unauthorized(res, 'invalid user token');
  }
  res.locals.authUser = { id: address, role: 'wallet', tokenType: 'user' } satisfies AuthUser;
  return next();
};
