import type {
  Ingredient,
  IngredientLine,
  Page,
  PageRequest,
  RecipeDoc,
  Tag,
  UserProfileDoc,
} from '../types/index.js';

export interface UserStore {
  getUser(id: string): Promise<UserProfileDoc | null>;
  getUsers(ids: string[]): Promise<UserProfileDoc[]>;
  findByUsername(username: string): Promise<UserProfileDoc | null>;
  listUsers(page: PageRequest): Promise<Page<UserProfileDoc>>;
  saveUser(profile: UserProfileDoc): Promise<UserProfileDoc>;
}

export interface IngredientStore {
  /** Case-insensitive prefix match, sorted by name. */
  listIngredients(namePrefix?: string): Promise<Ingredient[]>;
  getIngredients(ids: string[]): Promise<Ingredient[]>;
  addIngredients(entries: Omit<Ingredient, 'id'>[]): Promise<Ingredient[]>;
}

export interface TagStore {
  listTags(): Promise<Tag[]>;
  getTags(ids: string[]): Promise<Tag[]>;
  findTagsBySlugs(slugs: string[]): Promise<Tag[]>;
  addTags(entries: Omit<Tag, 'id'>[]): Promise<Tag[]>;
}

export interface NewRecipe {
  authorId: string;
  name: string;
  text: string;
  imageUrl?: string;
  cookingTime: number;
  tagIds: string[];
  ingredients: IngredientLine[];
}

export type RecipeChanges = Omit<NewRecipe, 'authorId'>;

export interface RecipeFilter {
  authorId?: string;
  tagIds?: string[]; // any of
  recipeIds?: string[]; // restrict to this set
}

export interface RecipeStore {
  createRecipe(recipe: NewRecipe): Promise<RecipeDoc>;
  getRecipe(id: string): Promise<RecipeDoc | null>;
  getRecipes(ids: string[]): Promise<RecipeDoc[]>;
  /** Newest first. */
  listRecipes(filter: RecipeFilter, page: PageRequest): Promise<Page<RecipeDoc>>;
  /** Fails with RecipeLockedError when the recipe is locked, NotFoundError when it is gone. */
  updateRecipe(id: string, changes: RecipeChanges): Promise<RecipeDoc>;
  /** Fails with RecipeLockedError when the recipe is locked, NotFoundError when it is gone. */
  deleteRecipe(id: string): Promise<void>;
}

export type RelationKind = 'favorites' | 'subscriptions';

/**
 * Unique (owner, target) pairs: (user, recipe) for favorites and
 * (follower, author) for subscriptions.
 */
export interface LedgerStore {
  /** Fails with AlreadyExistsError when the pair exists. */
  addRelation(kind: RelationKind, ownerId: string, targetId: string): Promise<void>;
  /** Fails with NotFoundError when the pair does not exist. */
  removeRelation(kind: RelationKind, ownerId: string, targetId: string): Promise<void>;
  hasRelation(kind: RelationKind, ownerId: string, targetId: string): Promise<boolean>;
  listTargets(kind: RelationKind, ownerId: string): Promise<string[]>;
  removeTarget(kind: RelationKind, targetId: string): Promise<void>;
}

export interface CartStore {
  getCart(userId: string): Promise<string[]>;
  /** Fails with AlreadyExistsError when the recipe is already selected. */
  addToCart(userId: string, recipeId: string): Promise<void>;
  /** Fails with NotFoundError when the recipe is not selected. */
  removeFromCart(userId: string, recipeId: string): Promise<void>;
  clearCart(userId: string): Promise<void>;
  removeRecipeEverywhere(recipeId: string): Promise<void>;
  /**
   * Atomically read the cart and the recipes it references, hand them to
   * `build`, then lock those recipes and empty the cart. Nothing is written
   * when `build` throws. A missing recipe is passed as null.
   */
  checkout<T>(userId: string, build: (selection: CartSelection) => T): Promise<T>;
}

export interface CartSelection {
  recipeIds: string[];
  recipes: Array<RecipeDoc | null>;
}

export interface ShortLinkStore {
  findCode(recipeId: string): Promise<string | null>;
  resolve(code: string): Promise<string | null>;
  /** Returns false when the code is taken. */
  saveLink(code: string, recipeId: string): Promise<boolean>;
}

export interface Stores {
  users: UserStore;
  ingredients: IngredientStore;
  tags: TagStore;
  recipes: RecipeStore;
  ledger: LedgerStore;
  carts: CartStore;
  shortLinks: ShortLinkStore;
}
