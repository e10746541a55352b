import * as vm from 'vm';
import { hasErrorCode, isRecord, stringField } from '../records';

describe('records', () => {
  it('should accept plain objects only', () => {
    expect(isRecord({ id: 'g1' })).toBe(true);
    expect(isRecord(null)).toBe(false);
    expect(isRecord(['g1'])).toBe(false);
    expect(isRecord('g1')).toBe(false);
  });

  it('should read string fields and ignore other types', () => {
    expect(stringField({ id: 'g1', count: 2 }, 'id')).toBe('g1');
    expect(stringField({ id: 'g1', count: 2 }, 'count')).toBeUndefined();
    expect(stringField({ id: 'g1' }, 'missing')).toBeUndefined();
  });

  it('should match error codes of errors raised in another realm', () => {
    const foreign: unknown = vm.runInNewContext(
      "Object.assign(new Error('no such file'), { code: 'ENOENT' })"
    );

    expect(foreign instanceof Error).toBe(false);
    expect(hasErrorCode(foreign, 'ENOENT')).toBe(true);
    expect(hasErrorCode(foreign, 'EACCES')).toBe(false);
  });

  it('should not match values without a code', () => {
    expect(hasErrorCode(new Error('boom'), 'ENOENT')).toBe(false);
    expect(hasErrorCode('ENOENT', 'ENOENT')).toBe(false);
    expect(hasErrorCode(undefined, 'ENOENT')).toBe(false);
  });
});
