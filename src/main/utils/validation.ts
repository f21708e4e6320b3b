export type PlainObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function ensureObject(value: unknown, field: string): PlainObject {
  if (!isPlainObject(value)) {
    throw new Error(`Field "${field}" must be an object.`);
  }
  return value;
}

export function ensureString(
  value: unknown,
  field: string,
  options?: { allowEmpty?: boolean; maxLength?: number }
): string {
  if (typeof value !== 'string') {
    throw new Error(`Field "${field}" must be a string.`);
  }
  if (!options?.allowEmpty && value.trim().length === 0) {
    throw new Error(`Field "${field}" cannot be empty.`);
  }
  if (options?.maxLength && value.length > options.maxLength) {
    throw new Error(`Field "${field}" exceeds maximum length of ${options.maxLength}`);
  }
  return value;
}

export function ensureNumber(
  value: unknown,
  field: string,
  options?: { min?: number; max?: number; integer?: boolean }
): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`Field "${field}" must be a number.`);
  }
  if (options?.integer && !Number.isInteger(value)) {
    throw new Error(`Field "${field}" must be an integer.`);
  }
  if (options?.min !== undefined && value < options.min) {
    throw new Error(`Field "${field}" must be >= ${options.min}.`);
  }
  if (options?.max !== undefined && value > options.max) {
    throw new Error(`Field "${field}" must be <= ${options.max}.`);
  }
  return value;
}

export function ensureStringArray(
  value: unknown,
  field: string,
  options?: { maxLength?: number; maxEntries?: number }
): string[] {
  if (!Array.isArray(value)) {
    throw new Error(`Field "${field}" must be an array.`);
  }
  if (options?.maxEntries && value.length > options.maxEntries) {
    throw new Error(`Field "${field}" exceeds maximum length of ${options.maxEntries}.`);
  }
  return value.map((entry, index) =>
    ensureString(entry, `${field}[${index}]`, { maxLength: options?.maxLength })
  );
}

export function ensureArray(value: unknown, field: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new Error(`Field "${field}" must be an array.`);
  }
  return value;
}

/** Parses an integer from an environment variable, `undefined` when unset. */
export function parseIntegerEnv(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`Environment variable ${name} must be an integer.`);
  }
  return parsed;
}
