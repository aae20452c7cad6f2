import { beforeEach, describe, expect, it } from 'vitest';
import { ForbiddenError, NotFoundError, RecipeLockedError, ValidationError } from '../src/errors.js';
import { RecipeService } from '../src/services/recipes.js';
import type { RecipeInput } from '../src/types/index.js';
import { addUser, seedCatalog, type Catalog } from './support/fixtures.js';
import { createMemoryStores, type MemoryStores } from './support/memoryStores.js';

describe('RecipeService', () => {
  let stores: MemoryStores;
  let catalog: Catalog;
  let recipes: RecipeService;

  function input(overrides: Partial<RecipeInput> = {}): RecipeInput {
    return {
      name: 'Pancakes',
      text: 'Whisk everything and fry.',
      cookingTime: 20,
      tags: [catalog.breakfast.id],
      ingredients: [
        { id: catalog.flour.id, amount: 200 },
        { id: catalog.egg.id, amount: 2 },
      ],
      ...overrides,
    };
  }

  beforeEach(async () => {
    stores = createMemoryStores();
    catalog = await seedCatalog(stores);
    await addUser(stores, 'alice');
    await addUser(stores, 'bob');
    recipes = new RecipeService(stores);
  });

  describe('createRecipe', () => {
    it('copies ingredient names and units from the catalog', async () => {
      const recipe = await recipes.createRecipe('alice', input({ name: '  Pancakes  ' }));

      expect(recipe.name).toBe('Pancakes');
      expect(recipe.authorId).toBe('alice');
      expect(recipe.locked).toBe(false);
      expect(recipe.tagIds).toEqual([catalog.breakfast.id]);
      expect(recipe.ingredients).toEqual([
        { ingredientId: catalog.flour.id, name: 'flour', measurementUnit: 'g', amount: 200 },
        { ingredientId: catalog.egg.id, name: 'egg', measurementUnit: 'pc', amount: 2 },
      ]);
    });

    it('requires the author to have a profile', async () => {
      await expect(recipes.createRecipe('carol', input())).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects an unknown ingredient', async () => {
      await expect(recipes.createRecipe('alice', input({ ingredients: [{ id: 'nope', amount: 1 }] }))).rejects.toThrow(
        'Unknown ingredient: nope'
      );
    });

    it('rejects an ingredient listed twice', async () => {
      const ingredients = [
        { id: catalog.flour.id, amount: 100 },
        { id: catalog.flour.id, amount: 50 },
      ];

      await expect(recipes.createRecipe('alice', input({ ingredients }))).rejects.toThrow(
        `Ingredient ${catalog.flour.id} is listed twice`
      );
    });

    it('rejects a recipe without ingredients', async () => {
      await expect(recipes.createRecipe('alice', input({ ingredients: [] }))).rejects.toThrow(
        'A recipe needs at least one ingredient'
      );
    });

    it('rejects a zero amount', async () => {
      await expect(
        recipes.createRecipe('alice', input({ ingredients: [{ id: catalog.sugar.id, amount: 0 }] }))
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('rejects a fractional amount', async () => {
      await expect(
        recipes.createRecipe('alice', input({ ingredients: [{ id: catalog.sugar.id, amount: 2.5 }] }))
      ).rejects.toThrow(`Amount of ingredient ${catalog.sugar.id} must be a whole number between 1 and 32000`);
    });

    it('rejects unknown and repeated tags', async () => {
      await expect(recipes.createRecipe('alice', input({ tags: ['tag-x'] }))).rejects.toThrow('Unknown tags: tag-x');
      await expect(
        recipes.createRecipe('alice', input({ tags: [catalog.dessert.id, catalog.dessert.id] }))
      ).rejects.toThrow(`Tag ${catalog.dessert.id} is listed twice`);
    });

    it('accepts a recipe without tags', async () => {
      const recipe = await recipes.createRecipe('alice', input({ tags: undefined }));

      expect(recipe.tagIds).toEqual([]);
    });

    it('rejects a cooking time out of range', async () => {
      await expect(recipes.createRecipe('alice', input({ cookingTime: 0 }))).rejects.toBeInstanceOf(ValidationError);
      await expect(recipes.createRecipe('alice', input({ cookingTime: 32001 }))).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('rejects a blank name', async () => {
      await expect(recipes.createRecipe('alice', input({ name: '   ' }))).rejects.toThrow('Recipe name is required');
    });
  });

  describe('updateRecipe', () => {
    it('replaces the content', async () => {
      const recipe = await recipes.createRecipe('alice', input());

      const updated = await recipes.updateRecipe(
        'alice',
        recipe.id,
        input({ name: 'Crepes', ingredients: [{ id: catalog.milk.id, amount: 250 }] })
      );

      expect(updated.name).toBe('Crepes');
      expect(updated.ingredients).toEqual([
        { ingredientId: catalog.milk.id, name: 'milk', measurementUnit: 'ml', amount: 250 },
      ]);
      expect(updated.createdAt).toEqual(recipe.createdAt);
    });

    it('only lets the author edit', async () => {
      const recipe = await recipes.createRecipe('alice', input());

      await expect(recipes.updateRecipe('bob', recipe.id, input())).rejects.toBeInstanceOf(ForbiddenError);
    });

    it('refuses to edit a recipe that has been exported', async () => {
      const recipe = await recipes.createRecipe('alice', input());
      await stores.carts.addToCart('bob', recipe.id);
      await stores.carts.checkout('bob', () => undefined);

      await expect(recipes.updateRecipe('alice', recipe.id, input())).rejects.toBeInstanceOf(RecipeLockedError);
    });

    it('fails for a missing recipe', async () => {
      await expect(recipes.updateRecipe('alice', 'missing', input())).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('deleteRecipe', () => {
    it('removes the recipe from favorites and carts', async () => {
      const recipe = await recipes.createRecipe('alice', input());
      await stores.ledger.addRelation('favorites', 'bob', recipe.id);
      await stores.carts.addToCart('bob', recipe.id);

      await recipes.deleteRecipe('alice', recipe.id);

      await expect(recipes.getRecipe(recipe.id)).rejects.toBeInstanceOf(NotFoundError);
      expect(await stores.ledger.listTargets('favorites', 'bob')).toEqual([]);
      expect(await stores.carts.getCart('bob')).toEqual([]);
    });

    it('refuses to delete a recipe that has been exported', async () => {
      const recipe = await recipes.createRecipe('alice', input());
      await stores.ledger.addRelation('favorites', 'bob', recipe.id);
      await stores.carts.addToCart('bob', recipe.id);
      await stores.carts.checkout('bob', () => undefined);

      await expect(recipes.deleteRecipe('alice', recipe.id)).rejects.toBeInstanceOf(RecipeLockedError);
      expect((await recipes.getRecipe(recipe.id)).locked).toBe(true);
      expect(await stores.ledger.listTargets('favorites', 'bob')).toEqual([recipe.id]);
    });

    it('only lets the author delete', async () => {
      const recipe = await recipes.createRecipe('alice', input());

      await expect(recipes.deleteRecipe('bob', recipe.id)).rejects.toBeInstanceOf(ForbiddenError);
    });
  });

  describe('listRecipes', () => {
    const page = { page: 1, limit: 10 };

    it('lists newest first and filters by author', async () => {
      const first = await recipes.createRecipe('alice', input({ name: 'First' }));
      const second = await recipes.createRecipe('alice', input({ name: 'Second' }));
      await recipes.createRecipe('bob', input({ name: 'Other' }));

      const result = await recipes.listRecipes({ authorId: 'alice' }, page);

      expect(result.count).toBe(2);
      expect(result.results.map((r) => r.id)).toEqual([second.id, first.id]);
    });

    it('filters by tag slug', async () => {
      const dessert = await recipes.createRecipe('alice', input({ name: 'Cake', tags: [catalog.dessert.id] }));
      await recipes.createRecipe('alice', input({ name: 'Toast' }));

      const result = await recipes.listRecipes({ tagSlugs: ['dessert'] }, page);

      expect(result.results.map((r) => r.id)).toEqual([dessert.id]);
    });

    it('rejects more tags than one query can match', async () => {
      const tagSlugs = Array.from({ length: 31 }, (_, i) => `tag-${i}`);

      await expect(recipes.listRecipes({ tagSlugs }, page)).rejects.toThrow('Filter by at most 30 tags');
    });

    it('returns an empty page for unknown slugs', async () => {
      await recipes.createRecipe('alice', input());

      const result = await recipes.listRecipes({ tagSlugs: ['brunch'] }, page);

      expect(result).toEqual({ count: 0, page: 1, pageSize: 10, results: [] });
    });

    it('intersects favorites with the shopping cart', async () => {
      const a = await recipes.createRecipe('alice', input({ name: 'A' }));
      const b = await recipes.createRecipe('alice', input({ name: 'B' }));
      await recipes.createRecipe('alice', input({ name: 'C' }));
      await stores.ledger.addRelation('favorites', 'bob', a.id);
      await stores.ledger.addRelation('favorites', 'bob', b.id);
      await stores.carts.addToCart('bob', b.id);

      const favorites = await recipes.listRecipes({ favoritesOf: 'bob' }, page);
      const both = await recipes.listRecipes({ favoritesOf: 'bob', inCartOf: 'bob' }, page);

      expect(favorites.results.map((r) => r.id)).toEqual([b.id, a.id]);
      expect(both.results.map((r) => r.id)).toEqual([b.id]);
    });

    it('pages through the results', async () => {
      for (const name of ['One', 'Two', 'Three']) {
        await recipes.createRecipe('alice', input({ name }));
      }

      const result = await recipes.listRecipes({}, { page: 2, limit: 2 });

      expect(result.count).toBe(3);
      expect(result.results.map((r) => r.name)).toEqual(['One']);
    });
  });
});
