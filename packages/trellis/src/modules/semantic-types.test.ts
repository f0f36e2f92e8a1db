/**
 * Tests for the Semantic Type Registry
 */

import { describe, it, expect } from 'vitest';
import { SemanticTypeRegistry } from './semantic-types.js';
import { parseSemanticTypes } from './loader.js';
import { isTrellisError } from '../errors.js';
import { SEMANTIC_TYPES, catchError } from '../testing/project.js';

const registry = new SemanticTypeRegistry(parseSemanticTypes(SEMANTIC_TYPES, 'semantic_types.yml'));

describe('SemanticTypeRegistry', () => {
  it('should look up format and category', () => {
    expect(registry.getFormat('type2')).toBe('csv');
    expect(registry.getCategory('type2')).toBe('tabular');
    expect(registry.isValid('type1')).toBe(true);
    expect(registry.isValid('Type1')).toBe(false);
  });

  it('should list types sorted', () => {
    expect(registry.allTypes()).toEqual(['buffers', 'park_boundaries', 'type1', 'type2']);
  });

  it('should suggest close names for an unknown type', () => {
    const error = catchError(() => registry.get('Park_Boundries'));
    expect(isTrellisError(error)).toBe(true);
    if (!isTrellisError(error)) return;
    expect(error.code).toBe('UNKNOWN_SEMANTIC_TYPE');
    expect(error.message).toBe("Unknown semantic type: 'Park_Boundries'. Did you mean: park_boundaries?");
  });
});
