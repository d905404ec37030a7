import type { IncomingMessage } from 'http';

const MAX_BODY_BYTES = 64 * 1024;

export type WebRequest = IncomingMessage & { body?: unknown };

export interface WebResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

export function html(body: string, status: number = 200): WebResponse {
  return { status, headers: { 'Content-Type': 'text/html; charset=utf-8' }, body };
}

export function json(payload: unknown, status: number = 200): WebResponse {
  return { status, headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(payload) };
}

export function redirect(location: string): WebResponse {
  return { status: 302, headers: { Location: location }, body: '' };
}

export function parseCookies(header: string | undefined): Record<string, string> {
  const cookies: Record<string, string> = {};
  if (!header) {
    return cookies;
  }

  for (const part of header.split(';')) {
    const separator = part.indexOf('=');
    if (separator === -1) {
      continue;
    }
    const name = part.slice(0, separator).trim();
    const value = part.slice(separator + 1).trim();
    if (name && !(name in cookies)) {
      cookies[name] = safeDecode(value);
    }
  }
  return cookies;
}

export interface CookieOptions {
  maxAgeSeconds: number;
  secure: boolean;
}

export function serializeCookie(name: string, value: string, options: CookieOptions): string {
  const parts = [
    `${name}=${encodeURIComponent(value)}`,
    `Max-Age=${options.maxAgeSeconds}`,
    'Path=/',
    'HttpOnly',
    'SameSite=Lax',
  ];
  if (options.secure) {
    parts.push('Secure');
  }
  return parts.join('; ');
}

/**
 * Percent-decodes a path segment or cookie value, keeping the raw text
 * when it is not valid percent-encoding.
 */
export function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * Reads an application/x-www-form-urlencoded body. Hosts such as Vercel
 * hand over an already parsed `body`; plain Node leaves the stream unread.
 */
export async function readForm(req: WebRequest): Promise<URLSearchParams> {
  const parsed = req.body;
  if (typeof parsed === 'string') {
    return new URLSearchParams(parsed);
  }
  if (Buffer.isBuffer(parsed)) {
    return new URLSearchParams(parsed.toString('utf8'));
  }
  if (parsed !== null && typeof parsed === 'object') {
    const form = new URLSearchParams();
    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value === 'string' || typeof value === 'number') {
        form.append(key, String(value));
      }
    }
    return form;
  }

  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new Error('Request body too large');
    }
    chunks.push(buffer);
  }
  return new URLSearchParams(Buffer.concat(chunks).toString('utf8'));
}

/**
 * Positive integer id from a path segment, or null.
 */
export function parseId(segment: string): number | null {
  if (!/^\d+$/.test(segment)) {
    return null;
  }
  const id = Number(segment);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}
