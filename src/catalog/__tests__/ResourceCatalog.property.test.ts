import * as fc from 'fast-check';
import { ResourceCatalog } from '../ResourceCatalog';
import { CatalogError } from '../../errors';
import { ResourceDescriptor } from '../../types';

const typeName = fc.stringMatching(/^[a-z][a-zA-Z]{0,11}$/);

function independent(name: string): ResourceDescriptor {
  return { name, command: 'lists', retrievalCapability: 'listable', dependencyKind: 'independent' };
}

function dependent(name: string, sourceType: string): ResourceDescriptor {
  return {
    name,
    command: 'list',
    retrievalCapability: 'listable',
    dependencyKind: 'dependent',
    sourceType,
    parameter: `${sourceType}Id`
  };
}

describe('ResourceCatalog Property Tests', () => {
  it('should accept every catalog whose dependents source from its independents', () => {
    fc.assert(
      fc.property(
        fc.uniqueArray(typeName, { minLength: 1, maxLength: 8 }),
        fc.array(fc.nat(), { maxLength: 8 }),
        (names, picks) => {
          const dependents = picks.map((pick, index) => dependent(`dependent${index}`, names[pick % names.length]));
          const catalog = new ResourceCatalog([...names.map(independent), ...dependents]);

          // Property: validation passes
          expect(() => catalog.validate()).not.toThrow();

          // Property: every dependent resolves to an independent descriptor
          for (const descriptor of catalog.dependentResources()) {
            expect(catalog.findIndependent(descriptor.sourceType ?? '')).toBeDefined();
          }

          // Property: passes partition the catalog
          expect(catalog.independentResources().length + catalog.dependentResources().length).toBe(catalog.size());
        }
      ),
      { numRuns: 100 }
    );
  });

  it('should reject every dependent whose source is missing', () => {
    fc.assert(
      fc.property(
        fc.uniqueArray(typeName, { minLength: 2, maxLength: 8 }),
        (names) => {
          const [missing, ...present] = names;
          const catalog = new ResourceCatalog([...present.map(independent), dependent('orphan0', missing)]);

          // Property: the unresolved source is reported by name
          expect(() => catalog.validate()).toThrow(CatalogError);
          expect(() => catalog.validate()).toThrow(`orphan0/list: sourceType ${missing} is unresolved`);
        }
      ),
      { numRuns: 100 }
    );
  });
});
