import * as fc from 'fast-check';
import { PathNamespace } from '../PathNamespace';
import { ResourceDescriptor } from '../../types';

const groupMembers: ResourceDescriptor = {
  name: 'groupMembers',
  command: 'listUsers',
  retrievalCapability: 'listable',
  dependencyKind: 'dependent',
  sourceType: 'group',
  parameter: 'groupId'
};

describe('PathNamespace', () => {
  it('should lowercase the resource type and keep the command', () => {
    expect(PathNamespace.baseSegments({ name: 'authorizationServer', command: 'lists' })).toEqual([
      'authorizationserver',
      'lists'
    ]);
  });

  it('should nest dependent records under their source identifier', () => {
    expect(PathNamespace.dependentSegments(groupMembers, '00g1')).toEqual(['groupmembers', 'listUsers', '00g1']);
  });

  it('should recover identifiers from record filenames', () => {
    expect(PathNamespace.fileName('00u1')).toBe('00u1.json');
    expect(PathNamespace.idFromFileName('00u1.json')).toBe('00u1');
  });

  it('should ignore files that are not records', () => {
    expect(PathNamespace.idFromFileName('notes.txt')).toBeUndefined();
    expect(PathNamespace.idFromFileName('.json')).toBeUndefined();
    expect(PathNamespace.idFromFileName('...json')).toBeUndefined();
  });

  it('should reject identifiers that are not a single path segment', () => {
    expect(PathNamespace.isSafeIdentifier('')).toBe(false);
    expect(PathNamespace.isSafeIdentifier('.')).toBe(false);
    expect(PathNamespace.isSafeIdentifier('..')).toBe(false);
    expect(PathNamespace.isSafeIdentifier('a/b')).toBe(false);
    expect(PathNamespace.isSafeIdentifier('a\\b')).toBe(false);
    expect(PathNamespace.isSafeIdentifier('a\0b')).toBe(false);
    expect(PathNamespace.isSafeIdentifier('00u1abc')).toBe(true);
  });

  it('should read only string ids from records', () => {
    expect(PathNamespace.recordId({ id: 'abc' })).toBe('abc');
    expect(PathNamespace.recordId({ id: 42 })).toBeUndefined();
    expect(PathNamespace.recordId({})).toBeUndefined();
  });

  it('should recover every safe identifier from its filename', () => {
    fc.assert(
      fc.property(fc.string({ minLength: 1, maxLength: 40 }), (id) => {
        fc.pre(PathNamespace.isSafeIdentifier(id));

        // Property: filename encoding is reversible for safe identifiers
        expect(PathNamespace.idFromFileName(PathNamespace.fileName(id))).toBe(id);
      })
    );
  });
});
