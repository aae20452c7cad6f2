#!/usr/bin/env tsx
/**
 * Load the ingredient and tag catalog into Firestore.
 *
 * Usage:
 *   tsx backend/scripts/import-catalog.ts [ingredients.json] [tags.json]
 *
 * Defaults to backend/data/ingredients.json and backend/data/tags.json.
 * Entries already in the catalog are skipped, so the script can be re-run.
 */

import dotenv from 'dotenv';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { loadConfig } from '../src/config.js';
import { CatalogService } from '../src/services/catalog.js';
import { initializeFirebase } from '../src/services/firebase.js';
import { createFirestoreStores } from '../src/services/firestore.js';
import { parseIngredientEntries, parseTagEntries } from '../src/services/catalogFile.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

dotenv.config();

async function main() {
  const ingredientsPath = process.argv[2] || join(__dirname, '../data/ingredients.json');
  const tagsPath = process.argv[3] || join(__dirname, '../data/tags.json');

  const config = loadConfig();
  const { firestore } = initializeFirebase(config.firebase);
  const stores = createFirestoreStores(firestore);
  const catalog = new CatalogService(stores.ingredients, stores.tags);

  console.log(`[CATALOG] Importing ingredients from ${ingredientsPath}`);
  const ingredients = await catalog.importIngredients(
    parseIngredientEntries(JSON.parse(readFileSync(ingredientsPath, 'utf-8')))
  );
  console.log(`[CATALOG] Ingredients: ${ingredients.created} created, ${ingredients.skipped} skipped`);

  console.log(`[CATALOG] Importing tags from ${tagsPath}`);
  const tags = await catalog.importTags(parseTagEntries(JSON.parse(readFileSync(tagsPath, 'utf-8'))));
  console.log(`[CATALOG] Tags: ${tags.created} created, ${tags.skipped} skipped`);
}

main().catch((error) => {
  console.error('[CATALOG] Import failed:', error);
  process.exit(1);
});
