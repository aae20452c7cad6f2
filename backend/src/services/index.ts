import type { AppConfig } from '../config.js';
import { CatalogService } from './catalog.js';
import { LedgerService } from './ledger.js';
import { RecipeService } from './recipes.js';
import { ShoppingListService } from './shoppingList.js';
import { ShortLinkService } from './shortLinks.js';
import type { Stores } from './stores.js';
import { UserService } from './users.js';
import { ViewBuilder } from './views.js';

export interface Services {
  catalog: CatalogService;
  recipes: RecipeService;
  ledger: LedgerService;
  shoppingList: ShoppingListService;
  shortLinks: ShortLinkService;
  users: UserService;
  views: ViewBuilder;
}

export function createServices(stores: Stores, config: Pick<AppConfig, 'publicUrl'>): Services {
  return {
    catalog: new CatalogService(stores.ingredients, stores.tags),
    recipes: new RecipeService(stores),
    ledger: new LedgerService(stores.ledger, stores.recipes, stores.users),
    shoppingList: new ShoppingListService(stores.carts, stores.recipes),
    shortLinks: new ShortLinkService(stores.shortLinks, stores.recipes, config.publicUrl),
    users: new UserService(stores.users),
    views: new ViewBuilder(stores),
  };
}
