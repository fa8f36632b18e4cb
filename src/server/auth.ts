/**
 * Authentication for viewer WebSocket connections
 */

import type { IncomingMessage } from 'http';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('auth');

/**
 * The parts of the upgrade request authentication looks at
 */
export type UpgradeRequest = Pick<IncomingMessage, 'url' | 'headers'> & {
  socket: { remoteAddress?: string };
};

/**
 * Authentication result
 */
export interface AuthResult {
  authenticated: boolean;
  viewerId: string | null;
  error?: string;
}

/**
 * Extract query parameters from URL
 */
function parseQueryString(url: string): Map<string, string> {
  const params = new Map<string, string>();

  try {
    const urlObj = new URL(url, 'http://localhost');
    urlObj.searchParams.forEach((value, key) => {
      params.set(key, value);
    });
  } catch (error) {
    logger.debug({ error, url }, 'Failed to parse URL');
  }

  return params;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Authenticate a viewer connection. With no API key configured every viewer
 * is accepted.
 */
export function authenticateViewer(request: UpgradeRequest, apiKey: string): AuthResult {
  const query = parseQueryString(request.url || '');

  // Viewer ID from header or query, falling back to the remote address
  const viewerId =
    headerValue(request.headers['x-viewer-id']) ||
    query.get('viewerId') ||
    query.get('viewer_id') ||
    request.socket.remoteAddress ||
    'anonymous';

  if (!apiKey) {
    return { authenticated: true, viewerId };
  }

  const providedKey =
    query.get('apiKey') ||
    query.get('api_key') ||
    headerValue(request.headers['x-api-key']);

  if (!providedKey) {
    logger.warn({
      ip: request.socket.remoteAddress
    }, 'Authentication failed: Missing API key');

    return {
      authenticated: false,
      viewerId: null,
      error: 'Missing API key'
    };
  }

  if (providedKey !== apiKey) {
    logger.warn({
      ip: request.socket.remoteAddress,
      providedKey: providedKey.substring(0, 8) + '...'
    }, 'Authentication failed: Invalid API key');

    return {
      authenticated: false,
      viewerId: null,
      error: 'Invalid API key'
    };
  }

  logger.info({
    viewerId,
    ip: request.socket.remoteAddress
  }, 'Authentication successful');

  return {
    authenticated: true,
    viewerId
  };
}
