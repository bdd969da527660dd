import { describe, expect, it } from 'vitest';
import { InvalidConfigurationError, UnknownCollectionError } from '../errors.js';
import { CollectionRegistry } from './registry.js';

describe('CollectionRegistry', () => {
  const registrations = [
    { name: 'Sample', sourceDocument: 'sample.pdf' },
    { name: 'Construction_Agreement', sourceDocument: 'Construction_Agreement.pdf' },
    { name: 'Construction_Contract', sourceDocument: 'Construction_Contract-for-Major-Works.pdf' },
  ];

  it('lists registrations in insertion order', () => {
    const registry = new CollectionRegistry(registrations);

    expect(registry.list().map((r) => r.name)).toEqual([
      'Sample',
      'Construction_Agreement',
      'Construction_Contract',
    ]);
  });

  it('returns copies from list', () => {
    const registry = new CollectionRegistry(registrations);
    const listed = registry.list();
    listed[0].sourceDocument = 'changed.pdf';

    expect(registry.resolve('Sample')).toBe('sample.pdf');
  });

  it('resolves a registered name to its source document', () => {
    const registry = new CollectionRegistry(registrations);

    expect(registry.resolve('Construction_Contract')).toBe('Construction_Contract-for-Major-Works.pdf');
  });

  it('resolves a registration without a document to undefined', () => {
    const registry = new CollectionRegistry();
    registry.register('Notes');

    expect(registry.resolve('Notes')).toBeUndefined();
    expect(registry.has('Notes')).toBe(true);
  });

  it('fails with UnknownCollection for an unregistered name', () => {
    const registry = new CollectionRegistry(registrations);

    expect(() => registry.resolve('Invoices')).toThrow(UnknownCollectionError);
    expect(() => registry.resolve('Invoices')).toThrow(
      'resolve: collection "Invoices" is not registered. Known collections: Sample, Construction_Agreement, Construction_Contract'
    );
  });

  it('rejects duplicate names', () => {
    const registry = new CollectionRegistry(registrations);

    expect(() => registry.register('Sample', 'other.pdf')).toThrow(InvalidConfigurationError);
    expect(registry.resolve('Sample')).toBe('sample.pdf');
  });

  it('rejects empty names', () => {
    const registry = new CollectionRegistry();

    expect(() => registry.register('  ')).toThrow('register: invalid collection name: must not be empty');
  });
});
