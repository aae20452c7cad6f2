import { ValidationError } from '../errors.js';
import type { Ingredient, Tag } from '../types/index.js';

// Catalog files are JSON arrays of plain objects, one per ingredient or tag

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readEntries(raw: unknown, what: string): Record<string, unknown>[] {
  if (!Array.isArray(raw)) {
    throw new ValidationError(`${what} file must contain a JSON array`);
  }
  return raw.map((entry, index) => {
    if (!isRecord(entry)) {
      throw new ValidationError(`${what} entry ${index} is not an object`);
    }
    return entry;
  });
}

function requireString(entry: Record<string, unknown>, field: string, where: string): string {
  const value = entry[field];
  if (typeof value !== 'string') {
    throw new ValidationError(`${where} is missing "${field}"`);
  }
  return value;
}

export function parseIngredientEntries(raw: unknown): Omit<Ingredient, 'id'>[] {
  return readEntries(raw, 'Ingredient').map((entry, index) => ({
    name: requireString(entry, 'name', `Ingredient entry ${index}`),
    measurementUnit: requireString(entry, 'measurementUnit', `Ingredient entry ${index}`),
  }));
}

export function parseTagEntries(raw: unknown): Omit<Tag, 'id'>[] {
  return readEntries(raw, 'Tag').map((entry, index) => ({
    name: requireString(entry, 'name', `Tag entry ${index}`),
    slug: requireString(entry, 'slug', `Tag entry ${index}`),
  }));
}
