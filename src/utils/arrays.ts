/**
 * Remove the first element identical to `value`, preserving the order
 * of the rest. Returns whether anything was removed.
 */
export function remove_first<T>(arr: T[], value: T): boolean {
  const index = arr.indexOf(value);
  if (index === -1) return false;
  arr.splice(index, 1);
  return true;
}

/**
 * Normalise a "one or many" option into a fresh array.
 */
export function to_list<T>(value: T | readonly T[] | undefined): T[] {
  if (value === undefined) return [];
  if (is_readonly_array(value)) return value.slice();
  return [value];
}

function is_readonly_array<T>(value: T | readonly T[]): value is readonly T[] {
  return Array.isArray(value);
}
