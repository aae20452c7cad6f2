import { NotFoundError, ValidationError } from '../errors.js';
import type { Ingredient, Tag } from '../types/index.js';
import type { IngredientStore, TagStore } from './stores.js';

const SLUG_PATTERN = /^[-a-zA-Z0-9_]+$/;

export interface ImportReport {
  created: number;
  skipped: number;
}

function catalogKey(name: string, measurementUnit: string): string {
  return `${name.trim().toLowerCase()}|${measurementUnit.trim().toLowerCase()}`;
}

export class CatalogService {
  constructor(
    private readonly ingredients: IngredientStore,
    private readonly tags: TagStore
  ) {}

  async listIngredients(namePrefix?: string): Promise<Ingredient[]> {
    const prefix = namePrefix?.trim();
    return this.ingredients.listIngredients(prefix || undefined);
  }

  async getIngredient(id: string): Promise<Ingredient> {
    const [ingredient] = await this.ingredients.getIngredients([id]);
    if (!ingredient) {
      throw new NotFoundError(`Ingredient ${id} not found`);
    }
    return ingredient;
  }

  async listTags(): Promise<Tag[]> {
    return this.tags.listTags();
  }

  async getTag(id: string): Promise<Tag> {
    const [tag] = await this.tags.getTags([id]);
    if (!tag) {
      throw new NotFoundError(`Tag ${id} not found`);
    }
    return tag;
  }

  /**
   * Bulk load ingredients, skipping any (name, unit) pair already in the
   * catalog or repeated in the input.
   */
  async importIngredients(entries: Omit<Ingredient, 'id'>[]): Promise<ImportReport> {
    const existing = await this.ingredients.listIngredients();
    const seen = new Set(existing.map((i) => catalogKey(i.name, i.measurementUnit)));
    const fresh: Omit<Ingredient, 'id'>[] = [];

    for (const entry of entries) {
      const name = entry.name.trim();
      const measurementUnit = entry.measurementUnit.trim();
      if (!name || !measurementUnit) {
        throw new ValidationError('Ingredient name and measurement unit are required');
      }
      const key = catalogKey(name, measurementUnit);
      if (seen.has(key)) continue;
      seen.add(key);
      fresh.push({ name, measurementUnit });
    }

    if (fresh.length > 0) {
      await this.ingredients.addIngredients(fresh);
    }
    return { created: fresh.length, skipped: entries.length - fresh.length };
  }

  /** Bulk load tags, skipping slugs already present. */
  async importTags(entries: Omit<Tag, 'id'>[]): Promise<ImportReport> {
    const existing = await this.tags.listTags();
    const seen = new Set(existing.map((t) => t.slug));
    const fresh: Omit<Tag, 'id'>[] = [];

    for (const entry of entries) {
      if (!SLUG_PATTERN.test(entry.slug)) {
        throw new ValidationError(`Invalid slug "${entry.slug}": use letters, digits, hyphens or underscores`);
      }
      if (seen.has(entry.slug)) continue;
      seen.add(entry.slug);
      fresh.push({ name: entry.name.trim(), slug: entry.slug });
    }

    if (fresh.length > 0) {
      await this.tags.addTags(fresh);
    }
    return { created: fresh.length, skipped: entries.length - fresh.length };
  }
}
