/**
 * inflector.ts
 * Noun pluralization used for collection resources and creation paths.
 */

import pluralize from 'pluralize';

export interface Inflector {
  pluralize(word: string): string;
}

/** English inflection backed by the `pluralize` package. */
export class PluralizeInflector implements Inflector {
  pluralize(word: string): string {
    return pluralize.plural(word);
  }
}
