import { randomBytes } from 'crypto';
import { NotFoundError } from '../errors.js';
import type { RecipeStore, ShortLinkStore } from './stores.js';

const MAX_ATTEMPTS = 5;

export function generateCode(): string {
  // 6 bytes → 8 url-safe characters
  return randomBytes(6).toString('base64url');
}

export class ShortLinkService {
  constructor(
    private readonly links: ShortLinkStore,
    private readonly recipes: RecipeStore,
    private readonly publicUrl: string,
    private readonly nextCode: () => string = generateCode
  ) {}

  /** One code per recipe; later calls return the same link. */
  async getShareLink(recipeId: string): Promise<string> {
    const recipe = await this.recipes.getRecipe(recipeId);
    if (!recipe) {
      throw new NotFoundError(`Recipe ${recipeId} not found`);
    }

    const existing = await this.links.findCode(recipeId);
    if (existing) return this.shortUrl(existing);

    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      const code = this.nextCode();
      if (await this.links.saveLink(code, recipeId)) {
        return this.shortUrl(code);
      }
    }
    throw new Error(`Could not allocate a short link for recipe ${recipeId}`);
  }

  /** Where a short code points to. */
  async resolve(code: string): Promise<string> {
    const recipeId = await this.links.resolve(code);
    if (!recipeId) {
      throw new NotFoundError(`Short link ${code} not found`);
    }
    return `${this.publicUrl}/recipes/${recipeId}/`;
  }

  private shortUrl(code: string): string {
    return `${this.publicUrl}/s/${code}`;
  }
}
