import { SocketConnection } from '../net/SocketConnection';
import { CAPTURE } from '@shared/constants';
import { ConnectError, getErrorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * First port on `host` that accepts a TCP connection, or null when none do.
 * Ports are tried in order and each connection is closed straight away.
 */
export async function checkTcpReachable(
  host: string,
  ports: readonly number[] = CAPTURE.REACHABILITY_PORTS,
  timeoutMs: number = CAPTURE.REACHABILITY_TIMEOUT_MS
): Promise<number | null> {
  for (const port of ports) {
    const connection = new SocketConnection();
    try {
      await connection.open(host, port, timeoutMs);
      await connection.close();
      logger.info(`[NET] ${host}:${port} is reachable`);
      return port;
    } catch (error) {
      if (!(error instanceof ConnectError)) {
        throw error;
      }
      logger.debug(`[NET] ${host}:${port} not reachable: ${error.message}`);
    }
  }
  logger.warn(`[NET] No response from ${host} on ports ${ports.join(', ')}`);
  return null;
}

export interface HttpAuthResult {
  ok: boolean;
  status?: number;
  error?: string;
}

/**
 * HTTP Basic-auth handshake against the instrument's web server. Some scopes
 * keep their LAN interface locked until it has been answered. Never throws.
 */
export async function tryHttpAuth(
  host: string,
  user: string,
  password: string,
  timeoutMs: number
): Promise<HttpAuthResult> {
  const headers: Record<string, string> = {};
  if (user) {
    headers.Authorization = `Basic ${Buffer.from(`${user}:${password}`).toString('base64')}`;
  }

  try {
    const response = await fetch(`http://${host}:${CAPTURE.HTTP_PORT}/`, {
      headers,
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      logger.warn(`[AUTH] ${host} answered HTTP ${response.status}`);
      return { ok: false, status: response.status };
    }
    logger.info('[AUTH] HTTP authentication handshake succeeded');
    return { ok: true, status: response.status };
  } catch (error) {
    const message = getErrorMessage(error);
    logger.debug(`[AUTH] Handshake with ${host} skipped: ${message}`);
    return { ok: false, error: message };
  }
}
