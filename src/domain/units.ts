/**
 * Physical unit helpers.
 *
 * Units attached to Results assets come from a job definition's declared
 * unit table; field-name suffixes are the fallback.
 */

/** Field-name suffix -> unit, checked in order. */
export const UNIT_SUFFIXES: ReadonlyArray<[string, string]> = [
  ['_W_per_mK', 'W/(m*K)'],
  ['_GPa', 'GPa'],
  ['_THz', 'THz'],
  ['_eV', 'eV'],
  ['_fs', 'fs'],
  ['_ps', 'ps'],
  ['_ns', 'ns'],
  ['_K', 'K'],
  ['_A', 'angstrom'],
];

/** A value annotated with its unit. */
export interface Unitful<T = unknown> {
  value: T;
  unit: string;
}

export function withUnit<T>(value: T, unit: string): Unitful<T> {
  return { value, unit };
}

export function isUnitful(value: unknown): value is Unitful {
  return (
    value !== null &&
    typeof value === 'object' &&
    'value' in value &&
    'unit' in value &&
    typeof value.unit === 'string'
  );
}

/** Strip a unit annotation, returning plain values unchanged. */
export function unitValue(value: unknown): unknown {
  return isUnitful(value) ? value.value : value;
}

/** Infer a unit from a field name suffix such as `kappa_W_per_mK` or `T_K`. */
export function inferUnit(field: string): string | undefined {
  for (const [suffix, unit] of UNIT_SUFFIXES) {
    if (field.endsWith(suffix)) return unit;
  }
  return undefined;
}

/**
 * Resolve units for a set of result fields: the declared table wins,
 * suffix inference fills the rest.
 */
export function resolveUnits(
  fields: Iterable<string>,
  declared: Record<string, { unit?: string }> = {},
): Record<string, string> {
  const units: Record<string, string> = {};
  for (const field of fields) {
    const unit = declared[field]?.unit ?? inferUnit(field);
    if (unit) units[field] = unit;
  }
  return units;
}
