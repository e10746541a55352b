import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BackupOrchestrator } from '../BackupOrchestrator';
import { RestoreOrchestrator } from '../RestoreOrchestrator';
import { ResourceCatalog } from '../../catalog/ResourceCatalog';
import { AssociationHandlerRegistry } from '../../handlers/AssociationHandlerRegistry';
import { BackupStore } from '../../managers/BackupStore';
import { IdMappingStore } from '../../managers/IdMappingStore';
import { ResourceDescriptor } from '../../types';
import { FakeBackend } from '../../__tests__/helpers/FakeBackend';
import { RecordingReporter } from '../../__tests__/helpers/RecordingReporter';

const descriptors: ResourceDescriptor[] = [
  { name: 'user', command: 'lists', retrievalCapability: 'listable', dependencyKind: 'independent' },
  { name: 'group', command: 'lists', retrievalCapability: 'listable', dependencyKind: 'independent' },
  { name: 'authorizationServer', command: 'lists', retrievalCapability: 'listable', dependencyKind: 'independent' },
  {
    name: 'groupMembers',
    command: 'listUsers',
    retrievalCapability: 'listable',
    dependencyKind: 'dependent',
    sourceType: 'group',
    parameter: 'groupId',
    assignment: { memberType: 'user', resourceType: 'group', command: 'addUserToGroup', memberParameter: 'userId' }
  },
  {
    name: 'authorizationServerClaims',
    command: 'listOAuth2Claims',
    retrievalCapability: 'listable',
    dependencyKind: 'dependent',
    sourceType: 'authorizationServer',
    parameter: 'authServerId'
  }
];

describe('backup then restore', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'envsync-roundtrip-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should recreate everything a backup captured under the new identifiers', async () => {
    const catalog = new ResourceCatalog(descriptors);
    const source = new FakeBackend();
    source.listings.set('user/lists', [{ id: 'u1', profile: { login: 'ada@example.com' } }]);
    source.listings.set('group/lists', [{ id: 'g1', profile: { name: 'Engineering' } }, { id: 'g2' }]);
    source.listings.set('authorizationServer/lists', [{ id: 'as1', name: 'default' }]);
    source.listings.set('groupMembers/listUsers/g1', [{ id: 'u1' }]);
    source.listings.set('authorizationServerClaims/listOAuth2Claims/as1', [
      { id: 'c1', name: 'groups' },
      { id: 'c2', name: 'email' }
    ]);

    const backupReport = await new BackupOrchestrator(
      source,
      new BackupStore(tempDir),
      new RecordingReporter(),
      catalog
    ).executeBackup();
    expect(backupReport.summary.recordsFailed).toBe(0);

    const target = new FakeBackend();
    const mapping = IdMappingStore.forRestoreDirectory(tempDir);
    const restoreReport = await new RestoreOrchestrator(
      target,
      new BackupStore(tempDir),
      mapping,
      new RecordingReporter(),
      catalog,
      AssociationHandlerRegistry.withDefaults()
    ).executeRestore();

    expect(mapping.count()).toBe(4);
    expect(mapping.snapshot()).toEqual({
      user: { u1: 'new-u1' },
      group: { g1: 'new-g1', g2: 'new-g2' },
      authorizationServer: { as1: 'new-as1' }
    });

    const claimCreates = target.createCalls.filter(call => call.resourceType === 'authorizationServerClaims');
    expect(claimCreates).toEqual([
      { resourceType: 'authorizationServerClaims', record: { id: 'c1', name: 'groups' }, options: { params: { authServerId: 'new-as1' } } },
      { resourceType: 'authorizationServerClaims', record: { id: 'c2', name: 'email' }, options: { params: { authServerId: 'new-as1' } } }
    ]);
    expect(target.associateCalls).toEqual([
      {
        resourceType: 'group',
        command: 'addUserToGroup',
        endpoints: { groupId: 'new-g1', userId: 'new-u1' },
        payload: undefined
      }
    ]);
    expect(restoreReport.summary.recordsFailed).toBe(0);
    expect(restoreReport.details.issues).toEqual([]);
  });
});
