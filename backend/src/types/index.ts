export type {
  Ingredient,
  IngredientLine,
  Page,
  RecipeDoc,
  ShoppingListEntry,
  Tag,
  UserProfileDoc,
} from '../../../shared/types/index.js';

export interface AuthUser {
  uid: string;
  email?: string;
}

export interface PageRequest {
  page: number;
  limit: number;
}

// ============================================================================
// Request bodies / query strings
// ============================================================================

export interface IngredientAmountInput {
  id: string; // ingredient id
  amount: number;
}

export interface RecipeInput {
  name: string;
  text: string;
  imageUrl?: string;
  cookingTime: number;
  tags?: string[]; // tag ids
  ingredients: IngredientAmountInput[];
}

export interface RecipeListQuery {
  page?: number;
  limit?: number;
  author?: string;
  tags?: string[]; // slugs
  isFavorited?: string;
  isInShoppingCart?: string;
}

export interface PageQuery {
  page?: number;
  limit?: number;
}

export interface SubscriptionListQuery extends PageQuery {
  recipesLimit?: number;
}

export interface ProfileInput {
  username: string;
  firstName: string;
  lastName: string;
  email?: string;
  avatarUrl?: string;
}

export interface IdParams {
  id: string;
}
