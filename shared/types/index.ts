// ============================================================================
// Catalog Types
// ============================================================================

export interface Ingredient {
  id: string;
  name: string;
  measurementUnit: string;
}

export interface Tag {
  id: string;
  name: string;
  slug: string;
}

// ============================================================================
// Recipe Types
// ============================================================================

// One (ingredient, amount) pair. Name and unit are copied from the catalog
// when the recipe is saved.
export interface IngredientLine {
  ingredientId: string;
  name: string;
  measurementUnit: string;
  amount: number;
}

// What an author submits
export interface RecipeContent {
  name: string;
  text: string;
  imageUrl?: string;
  cookingTime: number; // minutes
  tagIds: string[];
  ingredients: IngredientLine[];
}

// Generic recipe with flexible date type
// Backend uses Date, API clients get ISO strings
export interface RecipeBase<DateType = Date> extends RecipeContent {
  id: string;
  authorId: string;
  locked: boolean; // set once the recipe has been part of a shopping-list export
  createdAt: DateType;
  updatedAt: DateType;
}

export type RecipeDoc = RecipeBase<Date>;

// ============================================================================
// User Types
// ============================================================================

export interface UserProfileBase<DateType = Date> {
  id: string;
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  avatarUrl?: string;
  createdAt: DateType;
  updatedAt: DateType;
}

export type UserProfileDoc = UserProfileBase<Date>;

// ============================================================================
// API Representations
// ============================================================================

export interface UserView {
  id: string;
  email: string;
  username: string;
  firstName: string;
  lastName: string;
  avatarUrl: string | null;
  isSubscribed: boolean;
}

export interface RecipeSummary {
  id: string;
  name: string;
  imageUrl: string | null;
  cookingTime: number;
}

export interface SubscriptionView extends UserView {
  recipes: RecipeSummary[];
  recipesCount: number;
}

export interface IngredientLineView {
  id: string; // ingredient id
  name: string;
  measurementUnit: string;
  amount: number;
}

export interface RecipeView extends RecipeSummary {
  text: string;
  author: UserView;
  tags: Tag[];
  ingredients: IngredientLineView[];
  isFavorited: boolean;
  isInShoppingCart: boolean;
  locked: boolean;
  createdAt: string;
  updatedAt: string;
}

// Display-only: one aggregated shopping-list line
export interface ShoppingListEntry {
  name: string;
  measurementUnit: string;
  amount: number;
}

export interface Page<T> {
  count: number;
  page: number;
  pageSize: number;
  results: T[];
}

export type ErrorKind =
  | 'EmptyCartError'
  | 'InvalidRecipeError'
  | 'SelfSubscriptionError'
  | 'AlreadyExistsError'
  | 'NotFoundError'
  | 'ValidationError'
  | 'UnauthorizedError'
  | 'ForbiddenError'
  | 'RecipeLockedError'
  | 'InternalError';

export interface ApiErrorResponse {
  success: false;
  kind: ErrorKind;
  error: string;
}
