// src/graph/naming.ts
// Field-name conventions: plural collection keys, type names, back-reference fields.

const ES_PLURAL = /(sses|xes|zzes|ches|shes)$/;
const NON_PLURAL_S = /(ss|us|is)$/;

/**
 * Singular form of a field name: `properties` -> `property`,
 * `addresses` -> `address`, `units` -> `unit`. Names that do not look plural
 * are returned unchanged.
 */
export function singularize(field: string): string {
  if (field.length > 3 && field.endsWith("ies")) return `${field.slice(0, -3)}y`;
  if (ES_PLURAL.test(field)) return field.slice(0, -2);
  if (NON_PLURAL_S.test(field)) return field;
  if (field.length > 1 && field.endsWith("s")) return field.slice(0, -1);
  return field;
}

export function pluralize(word: string): string {
  if (/[^aeiou]y$/i.test(word)) return `${word.slice(0, -1)}ies`;
  if (/(s|x|z|ch|sh)$/i.test(word)) return `${word}es`;
  return `${word}s`;
}

export function capitalize(word: string): string {
  return word.length === 0 ? word : word[0].toUpperCase() + word.slice(1);
}

export function lowerFirst(word: string): string {
  return word.length === 0 ? word : word[0].toLowerCase() + word.slice(1);
}

/** `units` -> `Unit`, `currentTenant` -> `CurrentTenant` */
export function typeNameForField(field: string): string {
  return capitalize(singularize(field));
}

/** `Unit` -> `units`, `Property` -> `properties` */
export function collectionKeyForType(entityType: string): string {
  return pluralize(lowerFirst(entityType));
}

/** Scalar back-reference for a field holding one node: `owner` -> `ownerId` */
export function referenceField(field: string): string {
  return `${singularize(field)}Id`;
}

/** List back-reference for a field holding nodes: `units` -> `unitIds` */
export function referenceListField(field: string): string {
  return `${singularize(field)}Ids`;
}
