import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../src/app.js';
import { loadConfig, type AppConfig } from '../../src/config.js';
import type { TokenVerifier } from '../../src/services/firebase.js';
import type { Ingredient, IngredientLine, RecipeDoc, Tag, UserProfileDoc } from '../../src/types/index.js';
import { createMemoryStores, type MemoryStores } from './memoryStores.js';

export const PUBLIC_URL = 'https://recipes.test';

/** Accepts "token-<uid>" for any uid; everything else is rejected. */
export const fakeVerifier: TokenVerifier = {
  async verifyIdToken(token) {
    if (!token.startsWith('token-')) {
      throw new Error('invalid token');
    }
    const uid = token.slice('token-'.length);
    return { uid, email: `${uid}@example.com` };
  },
};

export function bearer(uid: string): { authorization: string } {
  return { authorization: `Bearer token-${uid}` };
}

export function makeLine(overrides: Partial<IngredientLine> = {}): IngredientLine {
  return {
    ingredientId: 'ing-flour',
    name: 'flour',
    measurementUnit: 'g',
    amount: 100,
    ...overrides,
  };
}

export function makeRecipe(overrides: Partial<RecipeDoc> = {}): RecipeDoc {
  return {
    id: `recipe-${Math.random().toString(36).slice(2, 8)}`,
    authorId: 'alice',
    name: 'Test Recipe',
    text: 'Mix and bake.',
    cookingTime: 30,
    tagIds: [],
    ingredients: [makeLine()],
    locked: false,
    createdAt: new Date('2024-01-01T00:00:00Z'),
    updatedAt: new Date('2024-01-01T00:00:00Z'),
    ...overrides,
  };
}

export async function addUser(stores: MemoryStores, id: string, username = id): Promise<UserProfileDoc> {
  const now = new Date('2024-01-01T00:00:00Z');
  return stores.users.saveUser({
    id,
    email: `${id}@example.com`,
    username,
    firstName: username,
    lastName: 'Tester',
    createdAt: now,
    updatedAt: now,
  });
}

export interface Catalog {
  flour: Ingredient;
  egg: Ingredient;
  sugar: Ingredient;
  milk: Ingredient;
  breakfast: Tag;
  dessert: Tag;
}

export async function seedCatalog(stores: MemoryStores): Promise<Catalog> {
  const [flour, egg, sugar, milk] = await stores.ingredients.addIngredients([
    { name: 'flour', measurementUnit: 'g' },
    { name: 'egg', measurementUnit: 'pc' },
    { name: 'sugar', measurementUnit: 'g' },
    { name: 'milk', measurementUnit: 'ml' },
  ]);
  const [breakfast, dessert] = await stores.tags.addTags([
    { name: 'Breakfast', slug: 'breakfast' },
    { name: 'Dessert', slug: 'dessert' },
  ]);
  return { flour, egg, sugar, milk, breakfast, dessert };
}

export function testConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({ PUBLIC_URL: PUBLIC_URL, ...env });
}

export interface TestApp {
  app: FastifyInstance;
  stores: MemoryStores;
  catalog: Catalog;
}

/** Fastify with in-memory stores, alice and bob signed up, and a small catalog. */
export async function buildTestApp(env: NodeJS.ProcessEnv = {}): Promise<TestApp> {
  const stores = createMemoryStores();
  const catalog = await seedCatalog(stores);
  await addUser(stores, 'alice');
  await addUser(stores, 'bob');
  const app = await buildApp({ config: testConfig(env), stores, verifier: fakeVerifier, logger: false });
  await app.ready();
  return { app, stores, catalog };
}
