import { AxiosError, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { OktaClient, USER_AGENT } from '../OktaClient';
import { RouteTable } from '../RouteTable';
import { BackendError } from '../../errors';

interface Reply {
  status: number;
  data?: unknown;
  headers?: Record<string, string>;
}

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  400: 'Bad Request',
  429: 'Too Many Requests',
  500: 'Internal Server Error',
  503: 'Service Unavailable'
};

const routes = RouteTable.fromObject({
  user: {
    lists: { method: 'GET', path: '/api/v1/users' },
    create: { method: 'POST', path: '/api/v1/users', query: { activate: 'false' } }
  },
  group: {
    addUserToGroup: { method: 'PUT', path: '/api/v1/groups/{groupId}/users/{userId}' }
  },
  roleAssignment: {
    listAssignedRolesForUser: { method: 'GET', path: '/api/v1/users/{userId}/roles', itemsField: 'roles' }
  },
  orgSetting: {
    gets: { method: 'GET', path: '/api/v1/org' },
    'create:gets': { method: 'PUT', path: '/api/v1/org' }
  }
});

describe('OktaClient', () => {
  let requests: InternalAxiosRequestConfig[];
  let replies: Reply[];

  const adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    requests.push(config);
    const reply = replies.shift() ?? { status: 200, data: {} };
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status,
      statusText: STATUS_TEXT[reply.status] ?? '',
      headers: reply.headers ?? {},
      config
    };
    if (reply.status >= 400) {
      throw new AxiosError(`Request failed with status code ${reply.status}`, 'ERR_BAD_RESPONSE', config, undefined, response);
    }
    return response;
  };

  const createClient = (maxRetries = 2): OktaClient =>
    new OktaClient(
      { orgUrl: 'https://dev-123.okta.com/', token: 'test-secret' },
      { maxRetries, retryDelay: 0, adapter },
      routes
    );

  beforeEach(() => {
    requests = [];
    replies = [];
  });

  describe('list', () => {
    it('should follow next links until the last page', async () => {
      replies = [
        {
          status: 200,
          data: [{ id: 'u1' }],
          headers: {
            link: '<https://dev-123.okta.com/api/v1/users>; rel="self", <https://dev-123.okta.com/api/v1/users?after=u1>; rel="next"'
          }
        },
        { status: 200, data: [{ id: 'u2' }] }
      ];

      const records = await createClient().list('user', 'lists');

      expect(records).toEqual([{ id: 'u1' }, { id: 'u2' }]);
      expect(requests.map(request => request.url)).toEqual([
        '/api/v1/users',
        'https://dev-123.okta.com/api/v1/users?after=u1'
      ]);
    });

    it('should send authentication and identification headers', async () => {
      replies = [{ status: 200, data: [] }];

      await createClient().list('user', 'lists');

      expect(requests[0].baseURL).toBe('https://dev-123.okta.com');
      expect(requests[0].headers.Authorization).toBe('SSWS test-secret');
      expect(requests[0].headers['User-Agent']).toBe(USER_AGENT);
    });

    it('should stop when a next link repeats', async () => {
      const link = { link: '<https://dev-123.okta.com/api/v1/users?after=u1>; rel="next"' };
      replies = [
        { status: 200, data: [{ id: 'u1' }], headers: link },
        { status: 200, data: [{ id: 'u1' }], headers: link }
      ];

      await expect(createClient().list('user', 'lists')).rejects.toThrow('Pagination of user lists does not terminate');
    });

    it('should read the list from the configured field and fill path parameters', async () => {
      replies = [{ status: 200, data: { roles: [{ id: 'r1', type: 'ORG_ADMIN' }, 'not a record'] } }];

      const records = await createClient().list('roleAssignment', 'listAssignedRolesForUser', { userId: 'u 1' });

      expect(records).toEqual([{ id: 'r1', type: 'ORG_ADMIN' }]);
      expect(requests[0].url).toBe('/api/v1/users/u%201/roles');
    });

    it('should reject a response that is not a list', async () => {
      replies = [{ status: 200, data: { id: 'u1' } }];

      await expect(createClient().list('user', 'lists')).rejects.toThrow(
        'Unexpected response for user lists: expected a list'
      );
    });

    it('should reject an unknown command', async () => {
      await expect(createClient().list('user', 'listFactors')).rejects.toThrow('No API route for user listFactors');
      expect(requests).toEqual([]);
    });
  });

  describe('retries', () => {
    it('should retry server errors', async () => {
      replies = [{ status: 500 }, { status: 429 }, { status: 200, data: [{ id: 'u1' }] }];

      const records = await createClient().list('user', 'lists');

      expect(records).toEqual([{ id: 'u1' }]);
      expect(requests).toHaveLength(3);
    });

    it('should give up after the configured number of retries', async () => {
      replies = [{ status: 503 }, { status: 503 }, { status: 503 }];

      const error = await createClient(2).list('user', 'lists').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BackendError);
      expect(error).toMatchObject({ message: 'user lists failed (HTTP 503: Service Unavailable)', status: 503 });
      expect(requests).toHaveLength(3);
    });

    it('should not retry client errors and include the error summary', async () => {
      replies = [{ status: 400, data: { errorSummary: 'Api validation failed: login' } }];

      const error = await createClient().create('user', { id: 'u1', profile: {} }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BackendError);
      expect(error).toMatchObject({
        message: 'user create failed (HTTP 400: Bad Request) - Api validation failed: login',
        status: 400,
        identifier: 'u1'
      });
      expect(requests).toHaveLength(1);
    });
  });

  describe('create', () => {
    it('should send the record without server-assigned fields', async () => {
      replies = [{ status: 200, data: { id: 'U1', status: 'STAGED' } }];

      const created = await createClient().create('user', {
        id: 'u1',
        created: '2024-01-01T00:00:00.000Z',
        status: 'ACTIVE',
        profile: { login: 'ada@example.com' },
        _links: { self: {} }
      });

      expect(created).toEqual({ id: 'U1', status: 'STAGED' });
      expect(requests[0].method).toBe('post');
      expect(requests[0].params).toEqual({ activate: 'false' });
      expect(JSON.parse(String(requests[0].data))).toEqual({ status: 'ACTIVE', profile: { login: 'ada@example.com' } });
    });

    it('should use the creation route of the capturing command', async () => {
      await createClient().create('orgSetting', { id: 'o1', companyName: 'Example Co' }, { command: 'gets' });

      expect(requests[0].method).toBe('put');
      expect(requests[0].url).toBe('/api/v1/org');
    });

    it('should reject a type without a creation route', async () => {
      await expect(createClient().create('group', { id: 'g1' })).rejects.toThrow('No API route for group create');
    });
  });

  describe('associate', () => {
    it('should fill both endpoints into the path', async () => {
      await createClient().associate('group', 'addUserToGroup', { groupId: 'G1', userId: 'U1' });

      expect(requests[0].method).toBe('put');
      expect(requests[0].url).toBe('/api/v1/groups/G1/users/U1');
    });

    it('should reject a missing endpoint before sending anything', async () => {
      await expect(createClient().associate('group', 'addUserToGroup', { groupId: 'G1' })).rejects.toThrow(
        'Missing parameter userId for group addUserToGroup'
      );
      expect(requests).toEqual([]);
    });
  });

  describe('get', () => {
    it('should return the singleton record', async () => {
      replies = [{ status: 200, data: { id: 'o1', companyName: 'Example Co' } }];

      await expect(createClient().get('orgSetting', 'gets')).resolves.toEqual({ id: 'o1', companyName: 'Example Co' });
    });

    it('should reject a response that is not an object', async () => {
      replies = [{ status: 200, data: [] }];

      await expect(createClient().get('orgSetting', 'gets')).rejects.toThrow(
        'Unexpected response for orgSetting gets: expected an object'
      );
    });
  });

  describe('writablePayload', () => {
    it('should keep only writable fields', () => {
      expect(OktaClient.writablePayload({ id: 'x', lastUpdated: 'y', name: 'n', _embedded: {} })).toEqual({ name: 'n' });
    });
  });
});
