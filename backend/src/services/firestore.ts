import {
  FieldValue,
  Timestamp,
  type CollectionReference,
  type DocumentData,
  type DocumentSnapshot,
  type Firestore,
  type Query,
} from 'firebase-admin/firestore';
import { AlreadyExistsError, NotFoundError, RecipeLockedError } from '../errors.js';
import type {
  Ingredient,
  IngredientLine,
  Page,
  PageRequest,
  RecipeDoc,
  Tag,
  UserProfileDoc,
} from '../types/index.js';
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
} from './stores.js';

// Firestore caps 'in' / 'array-contains-any' at 30 values and batches at 500 writes
const MAX_DISJUNCTION = 30;
const MAX_BATCH_WRITES = 500;

// ============================================================================
// Field readers
// ============================================================================

function readString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function readOptionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

function readNumber(value: unknown): number {
  return typeof value === 'number' ? value : 0;
}

function readStringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function readDate(value: unknown): Date {
  if (value instanceof Timestamp) return value.toDate();
  if (value instanceof Date) return value;
  return new Date(0);
}

function readIngredientLines(value: unknown): IngredientLine[] {
  if (!Array.isArray(value)) return [];
  return value.map((line: DocumentData) => ({
    ingredientId: readString(line.ingredientId),
    name: readString(line.name),
    measurementUnit: readString(line.measurementUnit),
    amount: readNumber(line.amount),
  }));
}

function toUser(snapshot: DocumentSnapshot): UserProfileDoc {
  const data: DocumentData = snapshot.data() ?? {};
  return {
    id: snapshot.id,
    email: readString(data.email),
    username: readString(data.username),
    firstName: readString(data.firstName),
    lastName: readString(data.lastName),
    avatarUrl: readOptionalString(data.avatarUrl),
    createdAt: readDate(data.createdAt),
    updatedAt: readDate(data.updatedAt),
  };
}

function toIngredient(snapshot: DocumentSnapshot): Ingredient {
  const data: DocumentData = snapshot.data() ?? {};
  return {
    id: snapshot.id,
    name: readString(data.name),
    measurementUnit: readString(data.measurementUnit),
  };
}

function toTag(snapshot: DocumentSnapshot): Tag {
  const data: DocumentData = snapshot.data() ?? {};
  return {
    id: snapshot.id,
    name: readString(data.name),
    slug: readString(data.slug),
  };
}

function toRecipe(snapshot: DocumentSnapshot): RecipeDoc {
  const data: DocumentData = snapshot.data() ?? {};
  return {
    id: snapshot.id,
    authorId: readString(data.authorId),
    name: readString(data.name),
    text: readString(data.text),
    imageUrl: readOptionalString(data.imageUrl),
    cookingTime: readNumber(data.cookingTime),
    tagIds: readStringArray(data.tagIds),
    ingredients: readIngredientLines(data.ingredients),
    locked: data.locked === true,
    createdAt: readDate(data.createdAt),
    updatedAt: readDate(data.updatedAt),
  };
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

async function getExisting<T>(
  db: Firestore,
  collection: CollectionReference,
  ids: string[],
  convert: (snapshot: DocumentSnapshot) => T
): Promise<T[]> {
  const unique = [...new Set(ids)];
  if (unique.length === 0) return [];
  const snapshots = await db.getAll(...unique.map((id) => collection.doc(id)));
  return snapshots.filter((snapshot) => snapshot.exists).map(convert);
}

async function paginate<T>(
  query: Query,
  { page, limit }: PageRequest,
  convert: (snapshot: DocumentSnapshot) => T
): Promise<Page<T>> {
  const [countSnapshot, snapshot] = await Promise.all([
    query.count().get(),
    query.offset((page - 1) * limit).limit(limit).get(),
  ]);
  return {
    count: countSnapshot.data().count,
    page,
    pageSize: limit,
    results: snapshot.docs.map(convert),
  };
}

// ============================================================================
// Users
// ============================================================================

class FirestoreUserStore implements UserStore {
  private readonly users: CollectionReference;

  constructor(private readonly db: Firestore) {
    this.users = db.collection('users');
  }

  async getUser(id: string): Promise<UserProfileDoc | null> {
    const doc = await this.users.doc(id).get();
    return doc.exists ? toUser(doc) : null;
  }

  async getUsers(ids: string[]): Promise<UserProfileDoc[]> {
    return getExisting(this.db, this.users, ids, toUser);
  }

  async findByUsername(username: string): Promise<UserProfileDoc | null> {
    const snapshot = await this.users.where('username', '==', username).limit(1).get();
    return snapshot.empty ? null : toUser(snapshot.docs[0]);
  }

  async listUsers(page: PageRequest): Promise<Page<UserProfileDoc>> {
    return paginate(this.users.orderBy('username'), page, toUser);
  }

  async saveUser(profile: UserProfileDoc): Promise<UserProfileDoc> {
    const { id, ...data } = profile;
    await this.users.doc(id).set(data);
    return profile;
  }
}

// ============================================================================
// Catalog
// ============================================================================

class FirestoreIngredientStore implements IngredientStore {
  private readonly ingredients: CollectionReference;

  constructor(private readonly db: Firestore) {
    this.ingredients = db.collection('ingredients');
  }

  async listIngredients(namePrefix?: string): Promise<Ingredient[]> {
    let query: Query = this.ingredients.orderBy('nameLower');
    if (namePrefix) {
      const prefix = namePrefix.toLowerCase();
      query = query.where('nameLower', '>=', prefix).where('nameLower', '<', `${prefix}\uf8ff`);
    }
    const snapshot = await query.get();
    return snapshot.docs.map(toIngredient);
  }

  async getIngredients(ids: string[]): Promise<Ingredient[]> {
    return getExisting(this.db, this.ingredients, ids, toIngredient);
  }

  async addIngredients(entries: Omit<Ingredient, 'id'>[]): Promise<Ingredient[]> {
    const created: Ingredient[] = [];
    for (const part of chunk(entries, MAX_BATCH_WRITES)) {
      const batch = this.db.batch();
      for (const entry of part) {
        const ref = this.ingredients.doc();
        batch.set(ref, { ...entry, nameLower: entry.name.toLowerCase() });
        created.push({ id: ref.id, ...entry });
      }
      await batch.commit();
    }
    return created;
  }
}

class FirestoreTagStore implements TagStore {
  private readonly tags: CollectionReference;

  constructor(private readonly db: Firestore) {
    this.tags = db.collection('tags');
  }

  async listTags(): Promise<Tag[]> {
    const snapshot = await this.tags.orderBy('name').get();
    return snapshot.docs.map(toTag);
  }

  async getTags(ids: string[]): Promise<Tag[]> {
    return getExisting(this.db, this.tags, ids, toTag);
  }

  async findTagsBySlugs(slugs: string[]): Promise<Tag[]> {
    const found: Tag[] = [];
    for (const part of chunk([...new Set(slugs)], MAX_DISJUNCTION)) {
      const snapshot = await this.tags.where('slug', 'in', part).get();
      found.push(...snapshot.docs.map(toTag));
    }
    return found;
  }

  async addTags(entries: Omit<Tag, 'id'>[]): Promise<Tag[]> {
    const batch = this.db.batch();
    const created = entries.map((entry) => {
      const ref = this.tags.doc();
      batch.set(ref, entry);
      return { id: ref.id, ...entry };
    });
    await batch.commit();
    return created;
  }
}

// ============================================================================
// Recipes
// ============================================================================

function matchesFilter(recipe: RecipeDoc, filter: RecipeFilter): boolean {
  if (filter.authorId && recipe.authorId !== filter.authorId) return false;
  if (filter.tagIds && !recipe.tagIds.some((id) => filter.tagIds?.includes(id))) return false;
  return true;
}

class FirestoreRecipeStore implements RecipeStore {
  private readonly recipes: CollectionReference;

  constructor(private readonly db: Firestore) {
    this.recipes = db.collection('recipes');
  }

  async createRecipe(recipe: NewRecipe): Promise<RecipeDoc> {
    const now = new Date();
    const data = { ...recipe, locked: false, createdAt: now, updatedAt: now };
    const docRef = await this.recipes.add(data);
    return { id: docRef.id, ...data };
  }

  async getRecipe(id: string): Promise<RecipeDoc | null> {
    const doc = await this.recipes.doc(id).get();
    return doc.exists ? toRecipe(doc) : null;
  }

  async getRecipes(ids: string[]): Promise<RecipeDoc[]> {
    return getExisting(this.db, this.recipes, ids, toRecipe);
  }

  async listRecipes(filter: RecipeFilter, page: PageRequest): Promise<Page<RecipeDoc>> {
    // A set of ids (favorites, cart) is small: load it and filter in memory
    if (filter.recipeIds) {
      const matching = (await this.getRecipes(filter.recipeIds))
        .filter((recipe) => matchesFilter(recipe, filter))
        .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
      const start = (page.page - 1) * page.limit;
      return {
        count: matching.length,
        page: page.page,
        pageSize: page.limit,
        results: matching.slice(start, start + page.limit),
      };
    }

    let query: Query = this.recipes;
    if (filter.authorId) {
      query = query.where('authorId', '==', filter.authorId);
    }
    if (filter.tagIds) {
      // Routes cap the tag filter at MAX_TAG_FILTER, which fits one disjunction
      query = query.where('tagIds', 'array-contains-any', filter.tagIds);
    }
    return paginate(query.orderBy('createdAt', 'desc'), page, toRecipe);
  }

  async updateRecipe(id: string, changes: RecipeChanges): Promise<RecipeDoc> {
    const ref = this.recipes.doc(id);
    return this.db.runTransaction(async (tx) => {
      const doc = await tx.get(ref);
      if (!doc.exists) {
        throw new NotFoundError(`Recipe ${id} not found`);
      }
      const current = toRecipe(doc);
      if (current.locked) {
        throw new RecipeLockedError(id);
      }
      const updatedAt = new Date();
      tx.update(ref, {
        ...changes,
        imageUrl: changes.imageUrl ?? FieldValue.delete(),
        updatedAt,
      });
      return { ...current, ...changes, updatedAt };
    });
  }

  async deleteRecipe(id: string): Promise<void> {
    const ref = this.recipes.doc(id);
    await this.db.runTransaction(async (tx) => {
      const doc = await tx.get(ref);
      if (!doc.exists) {
        throw new NotFoundError(`Recipe ${id} not found`);
      }
      if (doc.get('locked') === true) {
        throw new RecipeLockedError(id);
      }
      tx.delete(ref);
    });
  }
}

// ============================================================================
// Favorites / Subscriptions
// ============================================================================

const RELATION_FIELDS: Record<RelationKind, { owner: string; target: string }> = {
  favorites: { owner: 'userId', target: 'recipeId' },
  subscriptions: { owner: 'followerId', target: 'authorId' },
};

class FirestoreLedgerStore implements LedgerStore {
  constructor(private readonly db: Firestore) {}

  private relationRef(kind: RelationKind, ownerId: string, targetId: string) {
    return this.db.collection(kind).doc(`${ownerId}_${targetId}`);
  }

  async addRelation(kind: RelationKind, ownerId: string, targetId: string): Promise<void> {
    const ref = this.relationRef(kind, ownerId, targetId);
    const fields = RELATION_FIELDS[kind];
    await this.db.runTransaction(async (tx) => {
      const doc = await tx.get(ref);
      if (doc.exists) {
        throw new AlreadyExistsError(`${targetId} is already in ${kind}`);
      }
      tx.create(ref, { [fields.owner]: ownerId, [fields.target]: targetId, createdAt: new Date() });
    });
  }

  async removeRelation(kind: RelationKind, ownerId: string, targetId: string): Promise<void> {
    const ref = this.relationRef(kind, ownerId, targetId);
    await this.db.runTransaction(async (tx) => {
      const doc = await tx.get(ref);
      if (!doc.exists) {
        throw new NotFoundError(`${targetId} is not in ${kind}`);
      }
      tx.delete(ref);
    });
  }

  async hasRelation(kind: RelationKind, ownerId: string, targetId: string): Promise<boolean> {
    const doc = await this.relationRef(kind, ownerId, targetId).get();
    return doc.exists;
  }

  async listTargets(kind: RelationKind, ownerId: string): Promise<string[]> {
    const fields = RELATION_FIELDS[kind];
    const snapshot = await this.db
      .collection(kind)
      .where(fields.owner, '==', ownerId)
      .orderBy('createdAt')
      .get();
    return snapshot.docs.map((doc) => readString(doc.get(fields.target)));
  }

  async removeTarget(kind: RelationKind, targetId: string): Promise<void> {
    const fields = RELATION_FIELDS[kind];
    const snapshot = await this.db.collection(kind).where(fields.target, '==', targetId).get();
    for (const part of chunk(snapshot.docs, MAX_BATCH_WRITES)) {
      const batch = this.db.batch();
      part.forEach((doc) => batch.delete(doc.ref));
      await batch.commit();
    }
  }
}

// ============================================================================
// Shopping cart
// ============================================================================

// One document per user: every cart change is a transaction on that
// document, so changes and exports for the same user are serialized.
class FirestoreCartStore implements CartStore {
  private readonly carts: CollectionReference;
  private readonly recipes: CollectionReference;

  constructor(private readonly db: Firestore) {
    this.carts = db.collection('carts');
    this.recipes = db.collection('recipes');
  }

  async getCart(userId: string): Promise<string[]> {
    const doc = await this.carts.doc(userId).get();
    return readStringArray(doc.get('recipeIds'));
  }

  async addToCart(userId: string, recipeId: string): Promise<void> {
    const ref = this.carts.doc(userId);
    await this.db.runTransaction(async (tx) => {
      const doc = await tx.get(ref);
      const recipeIds = readStringArray(doc.get('recipeIds'));
      if (recipeIds.includes(recipeId)) {
        throw new AlreadyExistsError(`Recipe ${recipeId} is already in the shopping cart`);
      }
      tx.set(ref, { recipeIds: [...recipeIds, recipeId], updatedAt: new Date() });
    });
  }

  async removeFromCart(userId: string, recipeId: string): Promise<void> {
    const ref = this.carts.doc(userId);
    await this.db.runTransaction(async (tx) => {
      const doc = await tx.get(ref);
      const recipeIds = readStringArray(doc.get('recipeIds'));
      if (!recipeIds.includes(recipeId)) {
        throw new NotFoundError(`Recipe ${recipeId} is not in the shopping cart`);
      }
      tx.set(ref, { recipeIds: recipeIds.filter((id) => id !== recipeId), updatedAt: new Date() });
    });
  }

  async clearCart(userId: string): Promise<void> {
    await this.carts.doc(userId).set({ recipeIds: [], updatedAt: new Date() });
  }

  async removeRecipeEverywhere(recipeId: string): Promise<void> {
    const snapshot = await this.carts.where('recipeIds', 'array-contains', recipeId).get();
    for (const part of chunk(snapshot.docs, MAX_BATCH_WRITES)) {
      const batch = this.db.batch();
      part.forEach((doc) =>
        batch.update(doc.ref, { recipeIds: FieldValue.arrayRemove(recipeId), updatedAt: new Date() })
      );
      await batch.commit();
    }
  }

  async checkout<T>(userId: string, build: (selection: CartSelection) => T): Promise<T> {
    const cartRef = this.carts.doc(userId);
    return this.db.runTransaction(async (tx) => {
      const cart = await tx.get(cartRef);
      const recipeIds = readStringArray(cart.get('recipeIds'));
      const refs = recipeIds.map((id) => this.recipes.doc(id));
      const snapshots = refs.length > 0 ? await tx.getAll(...refs) : [];
      const recipes = snapshots.map((snapshot) => (snapshot.exists ? toRecipe(snapshot) : null));

      const result = build({ recipeIds, recipes });

      recipes.forEach((recipe, index) => {
        if (recipe && !recipe.locked) {
          tx.update(refs[index], { locked: true });
        }
      });
      tx.set(cartRef, { recipeIds: [], updatedAt: new Date() });
      return result;
    });
  }
}

// ============================================================================
// Short links
// ============================================================================

class FirestoreShortLinkStore implements ShortLinkStore {
  private readonly links: CollectionReference;

  constructor(private readonly db: Firestore) {
    this.links = db.collection('shortLinks');
  }

  async findCode(recipeId: string): Promise<string | null> {
    const snapshot = await this.links.where('recipeId', '==', recipeId).limit(1).get();
    return snapshot.empty ? null : snapshot.docs[0].id;
  }

  async resolve(code: string): Promise<string | null> {
    const doc = await this.links.doc(code).get();
    return doc.exists ? readString(doc.get('recipeId')) : null;
  }

  async saveLink(code: string, recipeId: string): Promise<boolean> {
    const ref = this.links.doc(code);
    return this.db.runTransaction(async (tx) => {
      const doc = await tx.get(ref);
      if (doc.exists) return false;
      tx.create(ref, { recipeId, createdAt: new Date() });
      return true;
    });
  }
}

export function createFirestoreStores(db: Firestore): Stores {
  return {
    users: new FirestoreUserStore(db),
    ingredients: new FirestoreIngredientStore(db),
    tags: new FirestoreTagStore(db),
    recipes: new FirestoreRecipeStore(db),
    ledger: new FirestoreLedgerStore(db),
    carts: new FirestoreCartStore(db),
    shortLinks: new FirestoreShortLinkStore(db),
  };
}
