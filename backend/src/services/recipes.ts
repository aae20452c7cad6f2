import { ForbiddenError, NotFoundError, ValidationError } from '../errors.js';
import type {
  IngredientLine,
  Page,
  PageRequest,
  RecipeDoc,
  RecipeInput,
} from '../types/index.js';
import type {
  CartStore,
  IngredientStore,
  LedgerStore,
  RecipeChanges,
  RecipeFilter,
  RecipeStore,
  TagStore,
  UserStore,
} from './stores.js';

export const MAX_NAME_LENGTH = 256;
export const MIN_COOKING_TIME = 1;
export const MAX_COOKING_TIME = 32000;
// Firestore takes at most 30 values in one array-contains-any query
export const MAX_TAG_FILTER = 30;
export const MIN_AMOUNT = 1;
export const MAX_AMOUNT = 32000;

export interface RecipeQuery {
  authorId?: string;
  tagSlugs?: string[];
  favoritesOf?: string;
  inCartOf?: string;
}

export interface RecipeServiceDeps {
  recipes: RecipeStore;
  ingredients: IngredientStore;
  tags: TagStore;
  users: UserStore;
  ledger: LedgerStore;
  carts: CartStore;
}

function findDuplicate(values: string[]): string | undefined {
  const seen = new Set<string>();
  return values.find((value) => {
    if (seen.has(value)) return true;
    seen.add(value);
    return false;
  });
}

export class RecipeService {
  constructor(private readonly deps: RecipeServiceDeps) {}

  async getRecipe(id: string): Promise<RecipeDoc> {
    const recipe = await this.deps.recipes.getRecipe(id);
    if (!recipe) {
      throw new NotFoundError(`Recipe ${id} not found`);
    }
    return recipe;
  }

  async listRecipes(query: RecipeQuery, page: PageRequest): Promise<Page<RecipeDoc>> {
    const empty: Page<RecipeDoc> = { count: 0, page: page.page, pageSize: page.limit, results: [] };
    const filter: RecipeFilter = { authorId: query.authorId };

    if (query.tagSlugs && query.tagSlugs.length > MAX_TAG_FILTER) {
      throw new ValidationError(`Filter by at most ${MAX_TAG_FILTER} tags`);
    }
    if (query.tagSlugs && query.tagSlugs.length > 0) {
      const tags = await this.deps.tags.findTagsBySlugs(query.tagSlugs);
      if (tags.length === 0) return empty;
      filter.tagIds = tags.map((tag) => tag.id);
    }

    let restrictTo: Set<string> | undefined;
    if (query.favoritesOf) {
      restrictTo = new Set(await this.deps.ledger.listTargets('favorites', query.favoritesOf));
    }
    if (query.inCartOf) {
      const cart = await this.deps.carts.getCart(query.inCartOf);
      restrictTo = new Set(restrictTo ? cart.filter((id) => restrictTo?.has(id)) : cart);
    }
    if (restrictTo) {
      if (restrictTo.size === 0) return empty;
      filter.recipeIds = [...restrictTo];
    }

    return this.deps.recipes.listRecipes(filter, page);
  }

  async createRecipe(authorId: string, input: RecipeInput): Promise<RecipeDoc> {
    const author = await this.deps.users.getUser(authorId);
    if (!author) {
      throw new ValidationError('Create your profile with PUT /api/users/me before publishing recipes');
    }
    const content = await this.validate(input);
    return this.deps.recipes.createRecipe({ authorId, ...content });
  }

  async updateRecipe(userId: string, id: string, input: RecipeInput): Promise<RecipeDoc> {
    await this.requireOwnRecipe(userId, id);
    const content = await this.validate(input);
    return this.deps.recipes.updateRecipe(id, content);
  }

  /**
   * Deletes the recipe and drops it from every favorite list and cart.
   * A recipe that has been exported to a shopping list stays.
   */
  async deleteRecipe(userId: string, id: string): Promise<void> {
    await this.requireOwnRecipe(userId, id);
    await this.deps.recipes.deleteRecipe(id);
    await this.deps.ledger.removeTarget('favorites', id);
    await this.deps.carts.removeRecipeEverywhere(id);
  }

  private async requireOwnRecipe(userId: string, id: string): Promise<RecipeDoc> {
    const recipe = await this.getRecipe(id);
    if (recipe.authorId !== userId) {
      throw new ForbiddenError();
    }
    return recipe;
  }

  private async validate(input: RecipeInput): Promise<RecipeChanges> {
    const name = input.name.trim();
    if (!name) throw new ValidationError('Recipe name is required');
    if (name.length > MAX_NAME_LENGTH) {
      throw new ValidationError(`Recipe name is longer than ${MAX_NAME_LENGTH} characters`);
    }
    const text = input.text.trim();
    if (!text) throw new ValidationError('Recipe description is required');

    if (
      !Number.isInteger(input.cookingTime) ||
      input.cookingTime < MIN_COOKING_TIME ||
      input.cookingTime > MAX_COOKING_TIME
    ) {
      throw new ValidationError(
        `Cooking time must be a whole number of minutes between ${MIN_COOKING_TIME} and ${MAX_COOKING_TIME}`
      );
    }

    const tagIds = input.tags ?? [];
    const duplicateTag = findDuplicate(tagIds);
    if (duplicateTag) throw new ValidationError(`Tag ${duplicateTag} is listed twice`);
    if (tagIds.length > 0) {
      const tags = await this.deps.tags.getTags(tagIds);
      const known = new Set(tags.map((tag) => tag.id));
      const unknown = tagIds.filter((id) => !known.has(id));
      if (unknown.length > 0) throw new ValidationError(`Unknown tags: ${unknown.join(', ')}`);
    }

    return {
      name,
      text,
      imageUrl: input.imageUrl?.trim() || undefined,
      cookingTime: input.cookingTime,
      tagIds,
      ingredients: await this.resolveIngredients(input),
    };
  }

  /** Check each line against the catalog and copy the name and unit in. */
  private async resolveIngredients(input: RecipeInput): Promise<IngredientLine[]> {
    if (input.ingredients.length === 0) {
      throw new ValidationError('A recipe needs at least one ingredient');
    }
    const ids = input.ingredients.map((line) => line.id);
    const duplicate = findDuplicate(ids);
    if (duplicate) throw new ValidationError(`Ingredient ${duplicate} is listed twice`);

    for (const line of input.ingredients) {
      if (!Number.isInteger(line.amount) || line.amount < MIN_AMOUNT || line.amount > MAX_AMOUNT) {
        throw new ValidationError(
          `Amount of ingredient ${line.id} must be a whole number between ${MIN_AMOUNT} and ${MAX_AMOUNT}`
        );
      }
    }

    const catalog = new Map(
      (await this.deps.ingredients.getIngredients(ids)).map((ingredient) => [ingredient.id, ingredient])
    );
    return input.ingredients.map((line) => {
      const ingredient = catalog.get(line.id);
      if (!ingredient) {
        throw new ValidationError(`Unknown ingredient: ${line.id}`);
      }
      return {
        ingredientId: ingredient.id,
        name: ingredient.name,
        measurementUnit: ingredient.measurementUnit,
        amount: line.amount,
      };
    });
  }
}
