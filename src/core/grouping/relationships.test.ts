import { describe, expect, it } from 'vitest';
import {
  detectRelationships,
  findRelationship,
  hasSimilarNaming,
  identifyTestAndImplementation,
  isTestImplementationPair,
} from './relationships.js';

describe('findRelationship', () => {
  it('links a test to the implementation it covers', () => {
    expect(findRelationship('src/user_service.py', 'tests/test_user_service.py')).toEqual({
      fileA: 'src/user_service.py',
      fileB: 'tests/test_user_service.py',
      relationshipType: 'test-implementation',
      strength: 1.0,
    });
  });

  it('pairs a component with its stylesheet', () => {
    expect(findRelationship('src/Button.tsx', 'src/Button.css')).toMatchObject({
      relationshipType: 'component-pair',
      strength: 0.9,
    });
  });

  it('detects similar naming across directories', () => {
    expect(findRelationship('src/user_model.ts', 'lib/user_view.ts')).toMatchObject({
      relationshipType: 'similar-naming',
      strength: 0.6,
    });
  });

  it('falls back to the shared directory', () => {
    expect(findRelationship('src/alpha.ts', 'src/beta.ts')).toMatchObject({
      relationshipType: 'same-directory',
      strength: 0.7,
    });
  });

  it('relates a file to one nested below its directory', () => {
    expect(findRelationship('src/index.ts', 'src/core/engine.ts')).toMatchObject({
      relationshipType: 'directory-hierarchy',
      strength: 0.5,
    });
  });

  it('returns null for files in unrelated directory trees', () => {
    expect(findRelationship('src/a.ts', 'lib/b.ts')).toBeNull();
  });
});

describe('test pairing helpers', () => {
  it('rejects two tests or two implementations', () => {
    expect(isTestImplementationPair('tests/test_a.py', 'tests/test_b.py')).toBe(false);
    expect(isTestImplementationPair('src/a.py', 'src/b.py')).toBe(false);
  });

  it('orders the pair as test then implementation', () => {
    expect(identifyTestAndImplementation('src/cart.ts', 'src/cart.test.ts')).toEqual([
      'src/cart.test.ts',
      'src/cart.ts',
    ]);
    expect(identifyTestAndImplementation('src/a.ts', 'src/b.ts')).toBeNull();
  });
});

describe('hasSimilarNaming', () => {
  it('requires enough shared name parts', () => {
    expect(hasSimilarNaming('a/user_model.ts', 'b/user_view.ts')).toBe(true);
    expect(hasSimilarNaming('a/user_profile_edit_form.ts', 'b/user.ts')).toBe(false);
    expect(hasSimilarNaming('a/alpha.ts', 'b/beta.ts')).toBe(false);
  });
});

describe('detectRelationships', () => {
  it('scans every pair in input order', () => {
    const relationships = detectRelationships([
      { path: 'src/Button.tsx' },
      { path: 'src/Button.css' },
      { path: 'docs/guide.md' },
    ]);

    expect(relationships.map((rel) => [rel.fileA, rel.fileB, rel.relationshipType])).toEqual([
      ['src/Button.tsx', 'src/Button.css', 'component-pair'],
    ]);
  });
});
