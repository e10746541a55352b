import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { RouteTable } from '../RouteTable';
import { ResourceCatalog } from '../../catalog/ResourceCatalog';
import { ConfigurationError, PersistenceError } from '../../errors';

describe('RouteTable', () => {
  describe('default table', () => {
    const routes = RouteTable.loadDefault();

    it('should route list commands', () => {
      expect(routes.retrieval('user', 'lists')).toEqual({ method: 'GET', path: '/api/v1/users' });
    });

    it('should create users without activating them', () => {
      expect(routes.creation('user')).toEqual({ method: 'POST', path: '/api/v1/users', query: { activate: 'false' } });
    });

    it('should prefer the creation route of the capturing command', () => {
      expect(routes.creation('orgSetting', 'gets')).toEqual({ method: 'POST', path: '/api/v1/org' });
      expect(routes.creation('group', 'unknown')).toEqual({ method: 'POST', path: '/api/v1/groups' });
    });

    it('should route association commands', () => {
      expect(routes.association('group', 'addUserToGroup')).toEqual({
        method: 'PUT',
        path: '/api/v1/groups/{groupId}/users/{userId}'
      });
    });

    it('should have a retrieval route for every catalogued resource', async () => {
      const catalog = await ResourceCatalog.loadDefault();
      const missing = catalog
        .getDescriptors()
        .filter(descriptor => routes.retrieval(descriptor.name, descriptor.command) === undefined)
        .map(descriptor => `${descriptor.name}/${descriptor.command}`);

      expect(missing).toEqual([]);
    });
  });

  describe('fromObject', () => {
    it('should reject a table that is not an object', () => {
      expect(() => RouteTable.fromObject([])).toThrow('Route table must be an object keyed by resource type');
    });

    it('should reject unsupported methods', () => {
      expect(() => RouteTable.fromObject({ user: { lists: { method: 'DELETE', path: '/api/v1/users' } } })).toThrow(
        'Route user.lists has unsupported method DELETE'
      );
    });

    it('should reject relative paths', () => {
      expect(() => RouteTable.fromObject({ user: { lists: { method: 'GET', path: 'api/v1/users' } } })).toThrow(
        ConfigurationError
      );
    });

    it('should reject query values that are not strings', () => {
      expect(() =>
        RouteTable.fromObject({ user: { create: { method: 'POST', path: '/api/v1/users', query: { activate: false } } } })
      ).toThrow('Route user.create query parameter activate must be a string');
    });

    it('should list the resource types it routes', () => {
      const routes = RouteTable.fromObject({
        user: { lists: { method: 'GET', path: '/api/v1/users' } },
        group: { lists: { method: 'GET', path: '/api/v1/groups' } }
      });

      expect(routes.resourceTypes()).toEqual(['user', 'group']);
      expect(routes.creation('user')).toBeUndefined();
    });
  });

  describe('fromFile', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'envsync-routes-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, { recursive: true, force: true });
    });

    it('should load a table from disk', () => {
      const filePath = path.join(tempDir, 'routes.json');
      fs.writeFileSync(filePath, JSON.stringify({ user: { lists: { method: 'GET', path: '/api/v1/users', itemsField: 'items' } } }));

      expect(RouteTable.fromFile(filePath).retrieval('user', 'lists')).toEqual({
        method: 'GET',
        path: '/api/v1/users',
        itemsField: 'items'
      });
    });

    it('should report a missing file as a persistence error', () => {
      expect(() => RouteTable.fromFile(path.join(tempDir, 'missing.json'))).toThrow(PersistenceError);
    });
  });
});
