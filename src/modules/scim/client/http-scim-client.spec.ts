import { ScimParseError, ScimTransportError } from '../common/scim-errors';
import type { ResourceType } from '../models/scim-models';
import { FetchFn, FetchRequestInit, HttpScimClient, buildUrl, resourcePath } from './http-scim-client';

const USERS: ResourceType = {
  name: 'User',
  endpoint: '/Users',
  schema: 'urn:ietf:params:scim:schemas:core:2.0:User',
  schemaExtensions: [],
};

type MockFetch = jest.Mock<ReturnType<FetchFn>, Parameters<FetchFn>>;

function respondWith(status: number, body: string): MockFetch {
  return jest.fn<ReturnType<FetchFn>, Parameters<FetchFn>>(async () => ({ status, text: async () => body }));
}

function lastRequest(fetchFn: MockFetch): [string, FetchRequestInit] {
  const call = fetchFn.mock.calls[fetchFn.mock.calls.length - 1];
  if (!call) throw new Error('fetch was not called');
  return call;
}

const USER_BODY = JSON.stringify({ schemas: ['urn:ietf:params:scim:schemas:core:2.0:User'], id: '42' });

describe('buildUrl', () => {
  it.each([
    ['https://scim.test/v2', '/Users', 'https://scim.test/v2/Users'],
    ['https://scim.test/v2/', '/Users', 'https://scim.test/v2/Users'],
    ['https://scim.test/v2', 'Users', 'https://scim.test/v2/Users'],
  ])('%s + %s → %s', (base, path, expected) => {
    expect(buildUrl(base, path)).toBe(expected);
  });

  it('should encode query parameters and skip empty ones', () => {
    expect(buildUrl('https://scim.test', '/Users', { filter: 'userName eq "a b"', count: 10, attributes: '' })).toBe(
      'https://scim.test/Users?filter=userName+eq+%22a+b%22&count=10',
    );
  });
});

describe('resourcePath', () => {
  it('should append an encoded id', () => {
    expect(resourcePath(USERS, 'a/b')).toBe('/Users/a%2Fb');
  });

  it('should add a leading slash to the endpoint', () => {
    expect(resourcePath({ ...USERS, endpoint: 'Users' })).toBe('/Users');
  });
});

describe('HttpScimClient', () => {
  it('should send SCIM headers and the bearer token', async () => {
    const fetchFn = respondWith(200, USER_BODY);
    const client = new HttpScimClient({ baseUrl: 'https://scim.test', token: 'test-secret', fetchFn });

    await client.query('/Users/42');

    const [url, init] = lastRequest(fetchFn);
    expect(url).toBe('https://scim.test/Users/42');
    expect(init.method).toBe('GET');
    expect(init.headers).toEqual({
      Accept: 'application/scim+json, application/json',
      Authorization: 'Bearer test-secret',
    });
    expect(init.body).toBeUndefined();
  });

  it('should omit Authorization without a token', async () => {
    const fetchFn = respondWith(200, USER_BODY);
    await new HttpScimClient({ baseUrl: 'https://scim.test', fetchFn }).query('/Users/42');
    expect(lastRequest(fetchFn)[1].headers.Authorization).toBeUndefined();
  });

  it('should POST a JSON payload on create', async () => {
    const fetchFn = respondWith(201, USER_BODY);
    const client = new HttpScimClient({ baseUrl: 'https://scim.test', fetchFn });
    const payload = { schemas: ['urn:ietf:params:scim:schemas:core:2.0:User'], userName: 'bjensen' };

    const message = await client.create(USERS, payload);

    const [url, init] = lastRequest(fetchFn);
    expect(url).toBe('https://scim.test/Users');
    expect(init.method).toBe('POST');
    expect(init.headers['Content-Type']).toBe('application/scim+json');
    expect(init.body).toBe(JSON.stringify(payload));
    expect(message.kind).toBe('Resource');
    expect(message.httpStatus).toBe(201);
  });

  it.each<[string, (client: HttpScimClient) => Promise<unknown>, string, string]>([
    ['update', (c) => c.update(USERS, '42', { schemas: [] }), 'PUT', 'https://scim.test/Users/42'],
    ['patch', (c) => c.patch(USERS, '42', { schemas: [], Operations: [] }), 'PATCH', 'https://scim.test/Users/42'],
    ['search', (c) => c.search(USERS, { schemas: [] }), 'POST', 'https://scim.test/Users/.search'],
  ])('%s should use %s', async (_name, call, method, expectedUrl) => {
    const fetchFn = respondWith(200, USER_BODY);
    await call(new HttpScimClient({ baseUrl: 'https://scim.test', fetchFn }));
    const [url, init] = lastRequest(fetchFn);
    expect(init.method).toBe(method);
    expect(url).toBe(expectedUrl);
  });

  it('should accept an empty DELETE response', async () => {
    const fetchFn = respondWith(204, '');
    const message = await new HttpScimClient({ baseUrl: 'https://scim.test', fetchFn }).delete(USERS, '42');
    expect(message).toEqual({ kind: 'Empty', httpStatus: 204 });
    expect(lastRequest(fetchFn)[1].method).toBe('DELETE');
  });

  it('should accept an empty PATCH response', async () => {
    const fetchFn = respondWith(204, '');
    const message = await new HttpScimClient({ baseUrl: 'https://scim.test', fetchFn }).patch(USERS, '42', {
      schemas: [],
      Operations: [],
    });
    expect(message.kind).toBe('Empty');
  });

  it('should reject an empty GET response with a parse error', async () => {
    const fetchFn = respondWith(200, '');
    await expect(new HttpScimClient({ baseUrl: 'https://scim.test', fetchFn }).query('/Users')).rejects.toBeInstanceOf(
      ScimParseError,
    );
  });

  it('should wrap network failures in ScimTransportError', async () => {
    const fetchFn = jest.fn<ReturnType<FetchFn>, Parameters<FetchFn>>(async () => {
      throw new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:9') });
    });
    const client = new HttpScimClient({ baseUrl: 'http://127.0.0.1:9', fetchFn });

    const failure = client.query('/Schemas');
    await expect(failure).rejects.toBeInstanceOf(ScimTransportError);
    await expect(failure).rejects.toThrow(
      'GET http://127.0.0.1:9/Schemas failed: fetch failed (connect ECONNREFUSED 127.0.0.1:9)',
    );
  });

  it('should report timeouts with the configured delay', async () => {
    const timeout = new Error('The operation was aborted due to timeout');
    timeout.name = 'TimeoutError';
    const fetchFn = jest.fn<ReturnType<FetchFn>, Parameters<FetchFn>>(async () => {
      throw timeout;
    });
    const client = new HttpScimClient({ baseUrl: 'https://scim.test', timeoutMs: 250, fetchFn });

    await expect(client.query('/Users')).rejects.toThrow('GET https://scim.test/Users failed: Request timed out after 250ms');
  });
});
