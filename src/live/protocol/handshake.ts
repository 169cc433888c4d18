import { createHash } from 'crypto';
import { IncomingMessage, STATUS_CODES } from 'http';

export const WEBSOCKET_GUID = '258EAFA5-E914-47DA-95CA-C5AB0DC85B11';

export type UpgradeValidation =
  | { ok: true; key: string }
  | { ok: false; status: number; reason: string };

type UpgradeRequest = Pick<IncomingMessage, 'method' | 'headers'>;

export function computeAcceptToken(key: string): string {
  return createHash('sha1')
    .update(key + WEBSOCKET_GUID)
    .digest('base64');
}

function headerValue(value: string | string[] | undefined): string {
  if (Array.isArray(value)) {
    return value[0] ?? '';
  }
  return value ?? '';
}

export function validateUpgradeRequest(req: UpgradeRequest): UpgradeValidation {
  if ((req.method ?? '').toUpperCase() !== 'GET') {
    return { ok: false, status: 405, reason: 'WebSocket upgrade requires GET' };
  }

  const upgrade = headerValue(req.headers.upgrade).toLowerCase();
  if (upgrade !== 'websocket') {
    return { ok: false, status: 400, reason: 'Unsupported upgrade protocol' };
  }

  const key = headerValue(req.headers['sec-websocket-key']).trim();
  if (!key) {
    return { ok: false, status: 400, reason: 'Missing Sec-WebSocket-Key header' };
  }

  return { ok: true, key };
}

export function buildHandshakeResponse(
  key: string,
  extraHeaders: Record<string, string> = {},
): string {
  const lines = [
    'HTTP/1.1 101 Switching Protocols',
    'Upgrade: websocket',
    'Connection: Upgrade',
    `Sec-WebSocket-Accept: ${computeAcceptToken(key)}`,
  ];
  for (const [name, value] of Object.entries(extraHeaders)) {
    lines.push(`${name}: ${value}`);
  }
  return lines.join('\r\n') + '\r\n\r\n';
}

/**
 * Plain HTTP answer for a refused upgrade, written straight to the socket
 */
export function buildHttpErrorResponse(status: number, reason: string): string {
  const body = Buffer.from(reason, 'utf8');
  return (
    [
      `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? 'Error'}`,
      'Content-Type: text/plain; charset=utf-8',
      `Content-Length: ${body.length}`,
      'Connection: close',
    ].join('\r\n') +
    '\r\n\r\n' +
    reason
  );
}
