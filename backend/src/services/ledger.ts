import { NotFoundError, SelfSubscriptionError } from '../errors.js';
import type { RecipeDoc, UserProfileDoc } from '../types/index.js';
import type { LedgerStore, RecipeStore, UserStore } from './stores.js';

/**
 * Favorites (user → recipe) and subscriptions (follower → author).
 *
 * Adding a pair that already exists fails with AlreadyExistsError and
 * removing a pair that does not exist fails with NotFoundError; both come
 * from the store so the check and the write happen together.
 */
export class LedgerService {
  constructor(
    private readonly ledger: LedgerStore,
    private readonly recipes: RecipeStore,
    private readonly users: UserStore
  ) {}

  async addFavorite(userId: string, recipeId: string): Promise<RecipeDoc> {
    const recipe = await this.requireRecipe(recipeId);
    await this.ledger.addRelation('favorites', userId, recipeId);
    return recipe;
  }

  async removeFavorite(userId: string, recipeId: string): Promise<void> {
    await this.requireRecipe(recipeId);
    await this.ledger.removeRelation('favorites', userId, recipeId);
  }

  async isFavorite(userId: string, recipeId: string): Promise<boolean> {
    return this.ledger.hasRelation('favorites', userId, recipeId);
  }

  async favoriteRecipeIds(userId: string): Promise<string[]> {
    return this.ledger.listTargets('favorites', userId);
  }

  async subscribe(followerId: string, authorId: string): Promise<UserProfileDoc> {
    if (followerId === authorId) {
      throw new SelfSubscriptionError();
    }
    const author = await this.requireUser(authorId);
    await this.ledger.addRelation('subscriptions', followerId, authorId);
    return author;
  }

  async unsubscribe(followerId: string, authorId: string): Promise<void> {
    await this.requireUser(authorId);
    await this.ledger.removeRelation('subscriptions', followerId, authorId);
  }

  async isSubscribed(followerId: string, authorId: string): Promise<boolean> {
    return this.ledger.hasRelation('subscriptions', followerId, authorId);
  }

  async subscribedAuthorIds(followerId: string): Promise<string[]> {
    return this.ledger.listTargets('subscriptions', followerId);
  }

  private async requireRecipe(recipeId: string): Promise<RecipeDoc> {
    const recipe = await this.recipes.getRecipe(recipeId);
    if (!recipe) {
      throw new NotFoundError(`Recipe ${recipeId} not found`);
    }
    return recipe;
  }

  private async requireUser(userId: string): Promise<UserProfileDoc> {
    const user = await this.users.getUser(userId);
    if (!user) {
      throw new NotFoundError(`User ${userId} not found`);
    }
    return user;
  }
}
