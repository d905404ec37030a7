import { describe, it, expect } from 'vitest';
import { Readable } from 'stream';
import { parseCookies, parseId, readForm, safeDecode, serializeCookie, WebRequest } from './http';

function streamRequest(body: string): WebRequest {
  return Object.assign(Readable.from([Buffer.from(body)]), { headers: {} }) as unknown as WebRequest;
}

describe('cookies', () => {
  it('parses a cookie header', () => {
    expect(parseCookies('sid=abc123; theme=dark%20mode; sid=ignored')).toEqual({ sid: 'abc123', theme: 'dark mode' });
    expect(parseCookies(undefined)).toEqual({});
  });

  it('serializes a session cookie', () => {
    expect(serializeCookie('sid', 'abc', { maxAgeSeconds: 60, secure: false })).toBe(
      'sid=abc; Max-Age=60; Path=/; HttpOnly; SameSite=Lax'
    );
    expect(serializeCookie('sid', 'abc', { maxAgeSeconds: 60, secure: true })).toBe(
      'sid=abc; Max-Age=60; Path=/; HttpOnly; SameSite=Lax; Secure'
    );
  });
});

describe('request helpers', () => {
  it('parses positive integer ids only', () => {
    expect(parseId('42')).toBe(42);
    expect(parseId('0')).toBeNull();
    expect(parseId('-1')).toBeNull();
    expect(parseId('4a')).toBeNull();
  });

  it('keeps invalid percent-encoding as-is', () => {
    expect(safeDecode('2024-03-10')).toBe('2024-03-10');
    expect(safeDecode('%E0%A4%A')).toBe('%E0%A4%A');
  });

  it('reads a urlencoded body from the stream', async () => {
    const form = await readForm(streamRequest('habit_name=Read+books&goal_duration=30'));

    expect(form.get('habit_name')).toBe('Read books');
    expect(form.get('goal_duration')).toBe('30');
  });

  it('uses a body already parsed by the host', async () => {
    const req = streamRequest('');
    req.body = { username: 'alice', password: 'test-secret', ignored: ['a'] };

    const form = await readForm(req);

    expect(form.get('username')).toBe('alice');
    expect(form.get('password')).toBe('test-secret');
    expect(form.has('ignored')).toBe(false);
  });
});
