/**
 * Semantic Type Registry - maps a semantic type name to its storage format
 * and data category.
 */

import { TrellisError, ERROR_CODES } from '../errors.js';
import type { SemanticType } from '../types.js';
import { loadSemanticTypes } from './loader.js';
import { findCloseMatches, formatSuggestions } from './suggest.js';

export class SemanticTypeRegistry {
  private readonly types: Map<string, SemanticType>;

  constructor(types: Record<string, SemanticType>) {
    this.types = new Map(Object.entries(types));
  }

  static async load(typesPath: string): Promise<SemanticTypeRegistry> {
    return new SemanticTypeRegistry(await loadSemanticTypes(typesPath));
  }

  get(name: string): SemanticType {
    const type = this.types.get(name);
    if (!type) {
      const suggestions = findCloseMatches(name, this.types.keys(), { ignoreCase: true });
      throw new TrellisError(
        'ReferenceError',
        ERROR_CODES.E3012,
        `Unknown semantic type: '${name}'.${formatSuggestions(suggestions)}`,
        { value: name, suggestions }
      );
    }
    return type;
  }

  getFormat(name: string): string {
    return this.get(name).format;
  }

  getCategory(name: string): string {
    return this.get(name).category;
  }

  isValid(name: string): boolean {
    return this.types.has(name);
  }

  allTypes(): string[] {
    return [...this.types.keys()].sort();
  }
}
