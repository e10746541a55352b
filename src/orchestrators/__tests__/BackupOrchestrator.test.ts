import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BackupOrchestrator } from '../BackupOrchestrator';
import { ResourceCatalog } from '../../catalog/ResourceCatalog';
import { BackupStore } from '../../managers/BackupStore';
import { PersistenceError } from '../../errors';
import { ResourceDescriptor } from '../../types';
import { FakeBackend } from '../../__tests__/helpers/FakeBackend';
import { RecordingReporter } from '../../__tests__/helpers/RecordingReporter';

const descriptors: ResourceDescriptor[] = [
  { name: 'orgSetting', command: 'gets', retrievalCapability: 'singleton', dependencyKind: 'independent' },
  { name: 'user', command: 'lists', retrievalCapability: 'listable', dependencyKind: 'independent' },
  { name: 'group', command: 'lists', retrievalCapability: 'listable', dependencyKind: 'independent' },
  {
    name: 'groupMembers',
    command: 'listUsers',
    retrievalCapability: 'listable',
    dependencyKind: 'dependent',
    sourceType: 'group',
    parameter: 'groupId',
    assignment: { memberType: 'user', resourceType: 'group', command: 'addUserToGroup', memberParameter: 'userId' }
  }
];

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

describe('BackupOrchestrator', () => {
  let tempDir: string;
  let backupDir: string;
  let backend: FakeBackend;
  let reporter: RecordingReporter;
  let orchestrator: BackupOrchestrator;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'envsync-backup-'));
    backupDir = path.join(tempDir, 'dev-123');
    backend = new FakeBackend();
    reporter = new RecordingReporter();

    backend.singletons.set('orgSetting/gets', { id: 'org1', companyName: 'Example Co' });
    backend.listings.set('user/lists', [{ id: 'u1' }, { id: 'u2' }]);
    backend.listings.set('group/lists', [{ id: 'g1', profile: { name: 'Engineering' } }, { id: 'g2' }]);
    backend.listings.set('groupMembers/listUsers/g1', [{ id: 'u1' }]);
    backend.listings.set('groupMembers/listUsers/g2', [{ id: 'u2' }]);

    orchestrator = new BackupOrchestrator(backend, new BackupStore(backupDir), reporter, new ResourceCatalog(descriptors));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should persist every pass into the path namespace', async () => {
    const report = await orchestrator.executeBackup();

    expect(readJson(path.join(backupDir, 'orgsetting', 'gets', 'org1.json'))).toEqual({
      id: 'org1',
      companyName: 'Example Co'
    });
    expect(fs.readdirSync(path.join(backupDir, 'user', 'lists')).sort()).toEqual(['u1.json', 'u2.json']);
    expect(readJson(path.join(backupDir, 'group', 'lists', 'g1.json'))).toEqual({
      id: 'g1',
      profile: { name: 'Engineering' }
    });
    expect(readJson(path.join(backupDir, 'groupmembers', 'listUsers', 'g1', 'u1.json'))).toEqual({ id: 'u1' });
    expect(readJson(path.join(backupDir, 'groupmembers', 'listUsers', 'g2', 'u2.json'))).toEqual({ id: 'u2' });

    expect(report.mode).toBe('backup');
    expect(report.target).toBe(backupDir);
    expect(report.summary.recordsProcessed).toBe(7);
    expect(report.summary.recordsSucceeded).toBe(7);
    expect(report.summary.mappingsAdded).toBe(0);
    expect(report.details.issues).toEqual([]);
  });

  it('should run the passes in order', async () => {
    await orchestrator.executeBackup();

    expect(reporter.phases.map(p => p.phase)).toEqual(['singleton', 'first-pass', 'second-pass']);
  });

  it('should parameterize dependent listings by the identifiers the first pass persisted', async () => {
    await orchestrator.executeBackup();

    expect(backend.listCalls.filter(call => call.resourceType === 'groupMembers')).toEqual([
      { resourceType: 'groupMembers', command: 'listUsers', params: { groupId: 'g1' } },
      { resourceType: 'groupMembers', command: 'listUsers', params: { groupId: 'g2' } }
    ]);
  });

  it('should read source identifiers from filenames rather than the backend', async () => {
    // A group that exists only on disk is still used as a source
    await new BackupStore(backupDir).writeRecord(['group', 'lists'], 'g0', { id: 'g0' });
    backend.listings.set('group/lists', []);

    await orchestrator.executeBackup();

    expect(backend.listCalls.filter(call => call.resourceType === 'groupMembers').map(call => call.params)).toEqual([
      { groupId: 'g0' }
    ]);
  });

  it('should name a singleton without an id after its command', async () => {
    backend.singletons.set('orgSetting/gets', { companyName: 'Example Co' });

    await orchestrator.executeBackup();

    expect(readJson(path.join(backupDir, 'orgsetting', 'gets', 'gets.json'))).toEqual({ companyName: 'Example Co' });
  });

  it('should skip records without a usable id', async () => {
    backend.listings.set('group/lists', [{ id: 'g1' }, { name: 'no id' }, { id: '../escape' }]);

    const report = await orchestrator.executeBackup();

    expect(fs.readdirSync(path.join(backupDir, 'group', 'lists'))).toEqual(['g1.json']);
    expect(fs.existsSync(path.join(backupDir, 'group', 'escape.json'))).toBe(false);
    expect(report.details.phases[1]).toEqual({
      phase: 'first-pass',
      processed: 5,
      succeeded: 3,
      skipped: 2,
      failed: 0
    });
  });

  it('should continue after a failed listing', async () => {
    backend.failingListings.add('user/lists');

    const report = await orchestrator.executeBackup();

    expect(fs.existsSync(path.join(backupDir, 'user'))).toBe(false);
    expect(fs.existsSync(path.join(backupDir, 'group', 'lists', 'g1.json'))).toBe(true);
    expect(report.summary.recordsFailed).toBe(1);
    expect(report.details.issues).toHaveLength(1);
    expect(report.details.issues[0]).toMatchObject({
      type: 'backend',
      phase: 'first-pass',
      resourceType: 'user',
      command: 'lists',
      recoverable: true
    });
  });

  it('should continue after a failed singleton', async () => {
    backend.singletons.clear();

    const report = await orchestrator.executeBackup();

    expect(report.details.phases[0]).toEqual({ phase: 'singleton', processed: 1, succeeded: 0, skipped: 0, failed: 1 });
    expect(report.summary.recordsSucceeded).toBe(6);
  });

  it('should skip a dependent whose source directory is missing', async () => {
    backend.listings.set('group/lists', []);

    const report = await orchestrator.executeBackup();

    expect(backend.listCalls.some(call => call.resourceType === 'groupMembers')).toBe(false);
    expect(report.details.issues).toHaveLength(1);
    expect(report.details.issues[0].type).toBe('resolution');
    expect(report.details.issues[0].message).toBe(
      `Source directory ${path.join(backupDir, 'group', 'lists')} not found for groupMembers, skipping...`
    );
  });

  it('should abort when the backup directory cannot be written', async () => {
    fs.writeFileSync(backupDir, 'not a directory');

    await expect(orchestrator.executeBackup()).rejects.toBeInstanceOf(PersistenceError);
  });
});
