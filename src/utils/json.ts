/** JSON.stringify replacer writing bigints as decimal strings. */
export const jsonReplacer = (_key: string, value: unknown): unknown => (
  typeof value === 'bigint' ? value.toString() : value
);

export const toJson = (value: unknown): string => JSON.stringify(value, jsonReplacer);
