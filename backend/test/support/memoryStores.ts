import { AlreadyExistsError, NotFoundError, RecipeLockedError } from '../../src/errors.js';
import type {
  CartSelection,
  CartStore,
  IngredientStore,
  LedgerStore,
  NewRecipe,
  RecipeChanges,
  RecipeFilter,
  RecipeStore,
  RelationKind,
  ShortLinkStore,
  Stores,
  TagStore,
  UserStore,
} from '../../src/services/stores.js';
import type { Ingredient, Page, PageRequest, RecipeDoc, Tag, UserProfileDoc } from '../../src/types/index.js';

/**
 * In-process stand-ins for the Firestore stores. Same contracts, plain Maps.
 * Recipe timestamps come from a counter so "newest first" is deterministic.
 */

function pageOf<T>(items: T[], { page, limit }: PageRequest): Page<T> {
  const start = (page - 1) * limit;
  return { count: items.length, page, pageSize: limit, results: items.slice(start, start + limit) };
}

function pick<T>(source: Map<string, T>, ids: string[]): T[] {
  return [...new Set(ids)].flatMap((id) => source.get(id) ?? []);
}

export class MemoryUserStore implements UserStore {
  readonly users = new Map<string, UserProfileDoc>();

  async getUser(id: string): Promise<UserProfileDoc | null> {
    return this.users.get(id) ?? null;
  }

  async getUsers(ids: string[]): Promise<UserProfileDoc[]> {
    return pick(this.users, ids);
  }

  async findByUsername(username: string): Promise<UserProfileDoc | null> {
    return [...this.users.values()].find((user) => user.username === username) ?? null;
  }

  async listUsers(page: PageRequest): Promise<Page<UserProfileDoc>> {
    const sorted = [...this.users.values()].sort((a, b) => a.username.localeCompare(b.username));
    return pageOf(sorted, page);
  }

  async saveUser(profile: UserProfileDoc): Promise<UserProfileDoc> {
    this.users.set(profile.id, profile);
    return profile;
  }
}

export class MemoryIngredientStore implements IngredientStore {
  readonly ingredients = new Map<string, Ingredient>();
  private nextId = 1;

  async listIngredients(namePrefix?: string): Promise<Ingredient[]> {
    const prefix = namePrefix?.toLowerCase();
    return [...this.ingredients.values()]
      .filter((ingredient) => !prefix || ingredient.name.toLowerCase().startsWith(prefix))
      .sort((a, b) => a.name.toLowerCase().localeCompare(b.name.toLowerCase()));
  }

  async getIngredients(ids: string[]): Promise<Ingredient[]> {
    return pick(this.ingredients, ids);
  }

  async addIngredients(entries: Omit<Ingredient, 'id'>[]): Promise<Ingredient[]> {
    return entries.map((entry) => {
      const ingredient = { id: `ing-${this.nextId++}`, ...entry };
      this.ingredients.set(ingredient.id, ingredient);
      return ingredient;
    });
  }
}

export class MemoryTagStore implements TagStore {
  readonly tags = new Map<string, Tag>();
  private nextId = 1;

  async listTags(): Promise<Tag[]> {
    return [...this.tags.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  async getTags(ids: string[]): Promise<Tag[]> {
    return pick(this.tags, ids);
  }

  async findTagsBySlugs(slugs: string[]): Promise<Tag[]> {
    return [...this.tags.values()].filter((tag) => slugs.includes(tag.slug));
  }

  async addTags(entries: Omit<Tag, 'id'>[]): Promise<Tag[]> {
    return entries.map((entry) => {
      const tag = { id: `tag-${this.nextId++}`, ...entry };
      this.tags.set(tag.id, tag);
      return tag;
    });
  }
}

export class MemoryRecipeStore implements RecipeStore {
  readonly recipes = new Map<string, RecipeDoc>();
  private nextId = 1;
  private clock = Date.UTC(2024, 0, 1);

  private tick(): Date {
    this.clock += 1000;
    return new Date(this.clock);
  }

  async createRecipe(recipe: NewRecipe): Promise<RecipeDoc> {
    const now = this.tick();
    const created: RecipeDoc = { id: `recipe-${this.nextId++}`, ...recipe, locked: false, createdAt: now, updatedAt: now };
    this.recipes.set(created.id, created);
    return created;
  }

  async getRecipe(id: string): Promise<RecipeDoc | null> {
    return this.recipes.get(id) ?? null;
  }

  async getRecipes(ids: string[]): Promise<RecipeDoc[]> {
    return pick(this.recipes, ids);
  }

  async listRecipes(filter: RecipeFilter, page: PageRequest): Promise<Page<RecipeDoc>> {
    const matching = [...this.recipes.values()]
      .filter((recipe) => !filter.authorId || recipe.authorId === filter.authorId)
      .filter((recipe) => !filter.tagIds || recipe.tagIds.some((id) => filter.tagIds?.includes(id)))
      .filter((recipe) => !filter.recipeIds || filter.recipeIds.includes(recipe.id))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    return pageOf(matching, page);
  }

  async updateRecipe(id: string, changes: RecipeChanges): Promise<RecipeDoc> {
    const current = this.recipes.get(id);
    if (!current) throw new NotFoundError(`Recipe ${id} not found`);
    if (current.locked) throw new RecipeLockedError(id);
    const updated: RecipeDoc = { ...current, ...changes, updatedAt: this.tick() };
    this.recipes.set(id, updated);
    return updated;
  }

  async deleteRecipe(id: string): Promise<void> {
    const current = this.recipes.get(id);
    if (!current) throw new NotFoundError(`Recipe ${id} not found`);
    if (current.locked) throw new RecipeLockedError(id);
    this.recipes.delete(id);
  }
}

export class MemoryLedgerStore implements LedgerStore {
  // kind -> ordered (owner, target) pairs
  private readonly relations: Record<RelationKind, Array<{ ownerId: string; targetId: string }>> = {
    favorites: [],
    subscriptions: [],
  };

  async addRelation(kind: RelationKind, ownerId: string, targetId: string): Promise<void> {
    if (await this.hasRelation(kind, ownerId, targetId)) {
      throw new AlreadyExistsError(`${targetId} is already in ${kind}`);
    }
    this.relations[kind].push({ ownerId, targetId });
  }

  async removeRelation(kind: RelationKind, ownerId: string, targetId: string): Promise<void> {
    const index = this.relations[kind].findIndex((r) => r.ownerId === ownerId && r.targetId === targetId);
    if (index === -1) {
      throw new NotFoundError(`${targetId} is not in ${kind}`);
    }
    this.relations[kind].splice(index, 1);
  }

  async hasRelation(kind: RelationKind, ownerId: string, targetId: string): Promise<boolean> {
    return this.relations[kind].some((r) => r.ownerId === ownerId && r.targetId === targetId);
  }

  async listTargets(kind: RelationKind, ownerId: string): Promise<string[]> {
    return this.relations[kind].filter((r) => r.ownerId === ownerId).map((r) => r.targetId);
  }

  async removeTarget(kind: RelationKind, targetId: string): Promise<void> {
    this.relations[kind] = this.relations[kind].filter((r) => r.targetId !== targetId);
  }
}

export class MemoryCartStore implements CartStore {
  readonly carts = new Map<string, string[]>();

  constructor(private readonly recipes: MemoryRecipeStore) {}

  async getCart(userId: string): Promise<string[]> {
    return [...(this.carts.get(userId) ?? [])];
  }

  async addToCart(userId: string, recipeId: string): Promise<void> {
    const cart = this.carts.get(userId) ?? [];
    if (cart.includes(recipeId)) {
      throw new AlreadyExistsError(`Recipe ${recipeId} is already in the shopping cart`);
    }
    this.carts.set(userId, [...cart, recipeId]);
  }

  async removeFromCart(userId: string, recipeId: string): Promise<void> {
    const cart = this.carts.get(userId) ?? [];
    if (!cart.includes(recipeId)) {
      throw new NotFoundError(`Recipe ${recipeId} is not in the shopping cart`);
    }
    this.carts.set(
      userId,
      cart.filter((id) => id !== recipeId)
    );
  }

  async clearCart(userId: string): Promise<void> {
    this.carts.set(userId, []);
  }

  async removeRecipeEverywhere(recipeId: string): Promise<void> {
    for (const [userId, cart] of this.carts) {
      this.carts.set(
        userId,
        cart.filter((id) => id !== recipeId)
      );
    }
  }

  async checkout<T>(userId: string, build: (selection: CartSelection) => T): Promise<T> {
    const recipeIds = await this.getCart(userId);
    const recipes = recipeIds.map((id) => this.recipes.recipes.get(id) ?? null);

    const result = build({ recipeIds, recipes });

    for (const recipe of recipes) {
      if (recipe && !recipe.locked) {
        this.recipes.recipes.set(recipe.id, { ...recipe, locked: true });
      }
    }
    this.carts.set(userId, []);
    return result;
  }
}

export class MemoryShortLinkStore implements ShortLinkStore {
  readonly links = new Map<string, string>();

  async findCode(recipeId: string): Promise<string | null> {
    for (const [code, target] of this.links) {
      if (target === recipeId) return code;
    }
    return null;
  }

  async resolve(code: string): Promise<string | null> {
    return this.links.get(code) ?? null;
  }

  async saveLink(code: string, recipeId: string): Promise<boolean> {
    if (this.links.has(code)) return false;
    this.links.set(code, recipeId);
    return true;
  }
}

export interface MemoryStores extends Stores {
  users: MemoryUserStore;
  ingredients: MemoryIngredientStore;
  tags: MemoryTagStore;
  recipes: MemoryRecipeStore;
  ledger: MemoryLedgerStore;
  carts: MemoryCartStore;
  shortLinks: MemoryShortLinkStore;
}

export function createMemoryStores(): MemoryStores {
  const recipes = new MemoryRecipeStore();
  return {
    users: new MemoryUserStore(),
    ingredients: new MemoryIngredientStore(),
    tags: new MemoryTagStore(),
    recipes,
    ledger: new MemoryLedgerStore(),
    carts: new MemoryCartStore(recipes),
    shortLinks: new MemoryShortLinkStore(),
  };
}
