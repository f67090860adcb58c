import { describe, it, expect } from 'vitest';
import { companyNodeId, normalizeName, personKey, pscKey } from '@/lib/network';

describe('identity keys', () => {
  it('lower-cases names and replaces each whitespace character', () => {
    expect(normalizeName('Jane Doe')).toBe('jane_doe');
    expect(normalizeName('Jane  Doe')).toBe('jane__doe');
    expect(normalizeName('JANE\tDOE')).toBe('jane_doe');
  });

  it('keeps officers and PSCs in separate namespaces', () => {
    expect(personKey('Jane Doe')).toBe('person_jane_doe');
    expect(pscKey('Jane Doe')).toBe('psc_jane_doe');
    expect(personKey('Jane Doe')).not.toBe(pscKey('Jane Doe'));
  });

  it('merges names that differ only in case', () => {
    expect(personKey('JOHN SMITH')).toBe(personKey('john smith'));
  });

  it('prefixes company numbers', () => {
    expect(companyNodeId('01234567')).toBe('company_01234567');
  });
});
