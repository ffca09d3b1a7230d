import { describe, expect, test } from 'vitest';
import { AxiosHttpTransport, buildCookieHeader, buildSessionHeaders } from '../../core/http-transport';

describe('buildCookieHeader', () => {
  test('should join real cookies and skip placeholders', () => {
    expect(
      buildCookieHeader({ sessionid: 'test-session', csrftoken: 'YOUR_CSRFTOKEN_HERE', ds_user_id: '1', rur: '' })
    ).toBe('sessionid=test-session; ds_user_id=1');
  });

  test('should be empty without cookies', () => {
    expect(buildCookieHeader({})).toBe('');
  });
});

describe('buildSessionHeaders', () => {
  test('should merge defaults, configured headers and the cookie', () => {
    expect(
      buildSessionHeaders({
        cookies: { sessionid: 'test-session' },
        headers: { 'X-IG-App-ID': 'YOUR_X_IG_APP_ID_HERE', Referer: 'https://www.instagram.com/', Accept: 'application/json' },
      })
    ).toEqual({
      Accept: 'application/json',
      'Accept-Language': 'en-US,en;q=0.9',
      Referer: 'https://www.instagram.com/',
      cookie: 'sessionid=test-session',
    });
  });

  test('should omit the cookie header when no cookie is set', () => {
    expect(buildSessionHeaders({ cookies: { sessionid: 'YOUR_SESSIONID_HERE' }, headers: {} })).toEqual({
      Accept: '*/*',
      'Accept-Language': 'en-US,en;q=0.9',
    });
  });
});

describe('AxiosHttpTransport', () => {
  test('should accept a proxy URL', () => {
    expect(
      () =>
        new AxiosHttpTransport({
          authentication: { cookies: {}, headers: {} },
          proxy: { https: 'http://127.0.0.1:8080' },
        })
    ).not.toThrow();
  });
});
