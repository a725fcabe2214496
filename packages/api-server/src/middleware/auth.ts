import type { Request, Response, NextFunction } from 'express';

export const API_KEYS_ENV = 'PAPERGRAPH_API_KEYS';

/**
 * Parse the PAPERGRAPH_API_KEYS env var: comma-separated keys, blanks ignored.
 * Example: "key-one, key-two"
 */
export function parseApiKeys(envValue: string | undefined): ReadonlyArray<string> {
  if (!envValue || envValue.trim() === '') {
    return [];
  }

  return envValue
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Validate API keys sent as `Authorization: Bearer <key>` or `X-API-Key: <key>`.
 * With no keys configured every request passes through. The accepted key is
 * stored on `res.locals.apiKey`.
 */
export function createAuthMiddleware(
  apiKeys: ReadonlyArray<string>,
): (req: Request, res: Response, next: NextFunction) => void {
  const accepted = new Set(apiKeys);

  return (req: Request, res: Response, next: NextFunction): void => {
    if (accepted.size === 0) {
      next();
      return;
    }

    const key = extractApiKey(req);

    if (!key) {
      res.status(401).json({
        error: 'Unauthorized',
        message: 'Missing API key. Provide via Authorization: Bearer <key> or X-API-Key: <key> header.',
      });
      return;
    }

    if (!accepted.has(key)) {
      res.status(401).json({
        error: 'Unauthorized',
        message: 'Invalid API key.',
      });
      return;
    }

    res.locals['apiKey'] = key;
    next();
  };
}

function extractApiKey(req: Request): string | undefined {
  const authHeader = req.headers['authorization'];
  if (authHeader && authHeader.startsWith('Bearer ')) {
    return authHeader.slice(7).trim();
  }

  const apiKeyHeader = req.headers['x-api-key'];
  if (typeof apiKeyHeader === 'string' && apiKeyHeader.trim().length > 0) {
    return apiKeyHeader.trim();
  }

  return undefined;
}
