import type {
  RecipeSummary,
  RecipeView,
  SubscriptionView,
  UserView,
} from '../../../shared/types/index.js';
import type { RecipeDoc, Tag, UserProfileDoc } from '../types/index.js';
import type { Stores } from './stores.js';

// Everything the viewer-dependent flags need, loaded once per response
interface ViewerContext {
  favorites: Set<string>;
  cart: Set<string>;
  subscriptions: Set<string>;
}

const ANONYMOUS: ViewerContext = {
  favorites: new Set(),
  cart: new Set(),
  subscriptions: new Set(),
};

export function recipeSummary(recipe: RecipeDoc): RecipeSummary {
  return {
    id: recipe.id,
    name: recipe.name,
    imageUrl: recipe.imageUrl ?? null,
    cookingTime: recipe.cookingTime,
  };
}

function missingAuthor(id: string): UserView {
  return {
    id,
    email: '',
    username: '',
    firstName: '',
    lastName: '',
    avatarUrl: null,
    isSubscribed: false,
  };
}

/** Builds the JSON representations returned by the API. */
export class ViewBuilder {
  constructor(private readonly stores: Pick<Stores, 'users' | 'tags' | 'recipes' | 'ledger' | 'carts'>) {}

  async userView(user: UserProfileDoc, viewerId?: string): Promise<UserView> {
    const [view] = await this.userViews([user], viewerId);
    return view;
  }

  async userViews(users: UserProfileDoc[], viewerId?: string): Promise<UserView[]> {
    const context = await this.viewerContext(viewerId);
    return users.map((user) => this.toUserView(user, context));
  }

  async subscriptionViews(
    authors: UserProfileDoc[],
    viewerId: string,
    recipesLimit: number
  ): Promise<SubscriptionView[]> {
    const context = await this.viewerContext(viewerId);
    return Promise.all(
      authors.map(async (author) => {
        const recipes = await this.stores.recipes.listRecipes(
          { authorId: author.id },
          { page: 1, limit: recipesLimit }
        );
        return {
          ...this.toUserView(author, context),
          recipes: recipes.results.map(recipeSummary),
          recipesCount: recipes.count,
        };
      })
    );
  }

  async recipeView(recipe: RecipeDoc, viewerId?: string): Promise<RecipeView> {
    const [view] = await this.recipeViews([recipe], viewerId);
    return view;
  }

  async recipeViews(recipes: RecipeDoc[], viewerId?: string): Promise<RecipeView[]> {
    if (recipes.length === 0) return [];

    const authorIds = [...new Set(recipes.map((recipe) => recipe.authorId))];
    const tagIds = [...new Set(recipes.flatMap((recipe) => recipe.tagIds))];
    const [authors, tags, context] = await Promise.all([
      this.stores.users.getUsers(authorIds),
      tagIds.length > 0 ? this.stores.tags.getTags(tagIds) : Promise.resolve<Tag[]>([]),
      this.viewerContext(viewerId),
    ]);
    const authorsById = new Map(authors.map((author) => [author.id, author]));
    const tagsById = new Map(tags.map((tag) => [tag.id, tag]));

    return recipes.map((recipe) => {
      const author = authorsById.get(recipe.authorId);
      return {
        ...recipeSummary(recipe),
        text: recipe.text,
        author: author ? this.toUserView(author, context) : missingAuthor(recipe.authorId),
        tags: recipe.tagIds.flatMap((id) => tagsById.get(id) ?? []),
        ingredients: recipe.ingredients.map((line) => ({
          id: line.ingredientId,
          name: line.name,
          measurementUnit: line.measurementUnit,
          amount: line.amount,
        })),
        isFavorited: context.favorites.has(recipe.id),
        isInShoppingCart: context.cart.has(recipe.id),
        locked: recipe.locked,
        createdAt: recipe.createdAt.toISOString(),
        updatedAt: recipe.updatedAt.toISOString(),
      };
    });
  }

  private toUserView(user: UserProfileDoc, context: ViewerContext): UserView {
    return {
      id: user.id,
      email: user.email,
      username: user.username,
      firstName: user.firstName,
      lastName: user.lastName,
      avatarUrl: user.avatarUrl ?? null,
      isSubscribed: context.subscriptions.has(user.id),
    };
  }

  private async viewerContext(viewerId?: string): Promise<ViewerContext> {
    if (!viewerId) return ANONYMOUS;
    const [favorites, cart, subscriptions] = await Promise.all([
      this.stores.ledger.listTargets('favorites', viewerId),
      this.stores.carts.getCart(viewerId),
      this.stores.ledger.listTargets('subscriptions', viewerId),
    ]);
    return {
      favorites: new Set(favorites),
      cart: new Set(cart),
      subscriptions: new Set(subscriptions),
    };
  }
}
