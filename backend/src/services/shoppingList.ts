import { formatShoppingListLine } from '../../../shared/ingredientDisplay.js';
import { EmptyCartError, InvalidRecipeError, NotFoundError } from '../errors.js';
import type { RecipeDoc, ShoppingListEntry } from '../types/index.js';
import type { CartSelection, CartStore, RecipeStore } from './stores.js';

export type ShoppingList = Map<string, ShoppingListEntry>;

export function ingredientKey(name: string, measurementUnit: string): string {
  return `${name}\u0000${measurementUnit}`;
}

/**
 * Merge the ingredient lines of every recipe in the cart into one entry per
 * (name, unit) pair. The same name under two units stays two entries.
 * A recipe listed twice counts once.
 */
export function aggregateIngredients(cart: Iterable<RecipeDoc>): ShoppingList {
  const recipes = new Map<string, RecipeDoc>();
  for (const recipe of cart) {
    recipes.set(recipe.id, recipe);
  }

  if (recipes.size === 0) {
    throw new EmptyCartError();
  }

  const list: ShoppingList = new Map();

  for (const recipe of recipes.values()) {
    if (recipe.ingredients.length === 0) {
      throw new InvalidRecipeError(`Recipe "${recipe.name}" has no ingredients`);
    }

    for (const line of recipe.ingredients) {
      if (!Number.isInteger(line.amount)) {
        throw new InvalidRecipeError(`Recipe "${recipe.name}" has a fractional amount of ${line.name}`);
      }
      if (line.amount <= 0) {
        throw new InvalidRecipeError(`Recipe "${recipe.name}" has a non-positive amount of ${line.name}`);
      }

      // Whole amounts: the sum is exact in any order
      const key = ingredientKey(line.name, line.measurementUnit);
      const existing = list.get(key);
      if (existing) {
        existing.amount += line.amount;
      } else {
        list.set(key, { name: line.name, measurementUnit: line.measurementUnit, amount: line.amount });
      }
    }
  }
  return list;
}

/** By ingredient name, then unit. */
export function sortShoppingList(list: ShoppingList): ShoppingListEntry[] {
  return [...list.values()].sort(
    (a, b) => a.name.localeCompare(b.name) || a.measurementUnit.localeCompare(b.measurementUnit)
  );
}

export function renderShoppingList(entries: ShoppingListEntry[]): string {
  return entries.map((entry) => `${formatShoppingListLine(entry)}\n`).join('');
}

/**
 * Resolve a cart selection into recipes. A selected recipe that no longer
 * exists makes the whole export invalid.
 */
export function resolveSelection(selection: CartSelection): RecipeDoc[] {
  if (selection.recipeIds.length === 0) {
    throw new EmptyCartError();
  }

  return selection.recipeIds.map((recipeId, index) => {
    const recipe = selection.recipes[index];
    if (!recipe) {
      throw new InvalidRecipeError(`Recipe ${recipeId} in the shopping cart no longer exists`);
    }
    return recipe;
  });
}

export interface ShoppingListExport {
  entries: ShoppingListEntry[];
  text: string;
  recipeCount: number;
}

export class ShoppingListService {
  constructor(
    private readonly carts: CartStore,
    private readonly recipes: RecipeStore
  ) {}

  async getCart(userId: string): Promise<string[]> {
    return this.carts.getCart(userId);
  }

  async addToCart(userId: string, recipeId: string): Promise<RecipeDoc> {
    const recipe = await this.recipes.getRecipe(recipeId);
    if (!recipe) {
      throw new NotFoundError(`Recipe ${recipeId} not found`);
    }
    await this.carts.addToCart(userId, recipeId);
    return recipe;
  }

  async removeFromCart(userId: string, recipeId: string): Promise<void> {
    await this.carts.removeFromCart(userId, recipeId);
  }

  async clearCart(userId: string): Promise<void> {
    await this.carts.clearCart(userId);
  }

  /**
   * Aggregate the user's cart, lock the exported recipes and empty the cart,
   * all inside one transaction on the user's cart.
   */
  async exportCart(userId: string): Promise<ShoppingListExport> {
    return this.carts.checkout(userId, (selection) => {
      const recipes = resolveSelection(selection);
      const entries = sortShoppingList(aggregateIngredients(recipes));
      return {
        entries,
        text: renderShoppingList(entries),
        recipeCount: recipes.length,
      };
    });
  }
}
