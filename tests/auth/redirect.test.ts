import { buildRedirectUrl, encodeRedirectPath, requestPath } from '../../src/auth/redirect';

describe('redirect targets', () => {
  test('builds url?param=path', () => {
    expect(buildRedirectUrl('/account/login', 'next', '/some/path', true)).toBe('/account/login?next=/some/path');
  });

  test('encodes query delimiters and spaces but keeps slashes', () => {
    expect(encodeRedirectPath('/a b&c=d')).toBe('/a%20b%26c%3Dd');
    expect(buildRedirectUrl('/login', 'return_to', '/files/a&b', true)).toBe('/login?return_to=/files/a%26b');
  });

  test('interpolates the raw path when encoding is off', () => {
    expect(buildRedirectUrl('/login', 'next', '/files/a&b', false)).toBe('/login?next=/files/a&b');
  });

  test('requestPath drops the query string', () => {
    expect(requestPath({ originalUrl: '/dashboard?tab=2', url: '/?tab=2' })).toBe('/dashboard');
    expect(requestPath({ originalUrl: '/app/reports', url: '/reports' })).toBe('/app/reports');
  });

  test('requestPath falls back to url when originalUrl is empty', () => {
    expect(requestPath({ originalUrl: '', url: '/inbox?x=1' })).toBe('/inbox');
  });
});
