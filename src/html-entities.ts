import entityData from './data/html-entities.json' with { type: 'json' };

/**
 * HTML 4 named character entities (without `&` and `;`) mapped to their code
 * points.
 */
const namedEntities: ReadonlyMap<string, number> = new Map(Object.entries(entityData));

/**
 * Look up the code point of a named HTML entity.
 *
 * Names are case sensitive (`&Eacute;` and `&eacute;` differ).
 *
 * @param name - Entity name without `&` and `;`, e.g. `nbsp`.
 * @returns The code point, or `undefined` for unknown names.
 */
export function lookupEntity (name: string): number | undefined {
  return namedEntities.get(name);
}
