import crypto from 'crypto';
import jwt from 'jsonwebtoken';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { env } from '../env.js';
import { AppError, formatErrorResponse } from '../utils/errors.js';

interface RateBucket {
  count: number;
  resetAt: number;
}

const rateBuckets = new Map<string, RateBucket>();

function getHeaderValue(header: string | string[] | undefined): string {
  if (Array.isArray(header)) {
    return header[0] ?? '';
  }
  return String(header ?? '');
}

function extractBearerToken(authorizationHeader: string): string {
  if (!authorizationHeader) return '';
  const parts = authorizationHeader.split(' ');
  if (parts.length !== 2) return '';
  const [scheme, token] = parts;
  if (!/^Bearer$/i.test(scheme)) return '';
  return token.trim();
}

function stableTokenHash(rawToken: string): string {
  return crypto.createHash('sha256').update(rawToken).digest('hex').slice(0, 16);
}

function cleanupExpiredBuckets(now: number) {
  if (rateBuckets.size < 5000) return;
  for (const [key, value] of rateBuckets.entries()) {
    if (value.resetAt <= now) {
      rateBuckets.delete(key);
    }
  }
}

function sendError(reply: FastifyReply, error: AppError) {
  reply.code(error.statusCode).send(formatErrorResponse(error));
}

export function extractAuthToken(request: FastifyRequest): string {
  const xApiToken = getHeaderValue(request.headers['x-api-token']).trim();
  if (xApiToken) return xApiToken;

  const authHeader = getHeaderValue(request.headers.authorization);
  return extractBearerToken(authHeader);
}

// Without a JWT_SECRET only the presence of a token is checked
export function verifyAuthToken(token: string): AppError | null {
  if (!env.JWT_SECRET) return null;

  try {
    jwt.verify(token, env.JWT_SECRET);
    return null;
  } catch (err) {
    if (err instanceof jwt.TokenExpiredError) {
      return AppError.tokenExpired();
    }
    return AppError.invalidToken();
  }
}

export function requireAuthIfEnabled(request: FastifyRequest, reply: FastifyReply): boolean {
  if (!env.AUTH_ENFORCEMENT_ENABLED) return true;

  const token = extractAuthToken(request);
  if (!token) {
    sendError(reply, AppError.unauthorized('Missing API token'));
    return false;
  }

  const failure = verifyAuthToken(token);
  if (failure) {
    sendError(reply, failure);
    return false;
  }

  return true;
}

const TRUSTED_PROXY_RANGES = [
  // Private IP ranges (RFC 1918)
  /^10\./,
  /^172\.(1[6-9]|2[0-9]|3[0-1])\./,
  /^192\.168\./,
  // Localhost
  /^127\./,
  /^::1$/,
];

function isTrustedProxy(ip: string): boolean {
  return TRUSTED_PROXY_RANGES.some(range => range.test(ip));
}

function getRealClientIP(request: FastifyRequest): string {
  const clientIP = request.ip;

  if (isTrustedProxy(clientIP)) {
    const forwarded = request.headers['x-forwarded-for'];
    if (forwarded && typeof forwarded === 'string') {
      // X-Forwarded-For: client, proxy1, proxy2, ...
      const ips = forwarded.split(',').map(ip => ip.trim());

      // Rightmost untrusted address is the real client
      for (let i = ips.length - 1; i >= 0; i--) {
        const ip = ips[i];
        if (ip && !isTrustedProxy(ip)) {
          return ip;
        }
      }

      return ips[0] || clientIP;
    }

    const realIP = request.headers['x-real-ip'];
    if (realIP && typeof realIP === 'string') {
      return realIP;
    }
  }

  return clientIP;
}

interface RateLimitOptions {
  routeKey: string;
  maxRequests: number;
}

export function enforceRateLimitIfEnabled(
  request: FastifyRequest,
  reply: FastifyReply,
  options: RateLimitOptions,
): boolean {
  if (!env.RATE_LIMITING_ENABLED) return true;

  const now = Date.now();
  cleanupExpiredBuckets(now);

  // Unverified tokens are free to mint, so they never get their own bucket
  const token = extractAuthToken(request);
  const verified = token !== '' && env.JWT_SECRET !== '' && verifyAuthToken(token) === null;
  const clientKey = verified
    ? `token:${stableTokenHash(token)}`
    : `ip:${getRealClientIP(request)}`;
  const bucketKey = `${options.routeKey}:${clientKey}`;

  const current = rateBuckets.get(bucketKey);
  if (!current || current.resetAt <= now) {
    rateBuckets.set(bucketKey, {
      count: 1,
      resetAt: now + env.RATE_LIMIT_WINDOW_MS,
    });
    return true;
  }

  if (current.count >= options.maxRequests) {
    const retryAfterSeconds = Math.max(1, Math.ceil((current.resetAt - now) / 1000));
    reply.header('Retry-After', String(retryAfterSeconds));
    sendError(reply, AppError.rateLimited(retryAfterSeconds, 'Too many requests. Please try again later.'));
    return false;
  }

  current.count += 1;
  return true;
}

export function clearRateLimits() {
  rateBuckets.clear();
}

// Export for testing
export { getRealClientIP, isTrustedProxy };
