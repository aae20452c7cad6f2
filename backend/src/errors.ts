import type { ErrorKind } from '../../shared/types/index.js';

/**
 * Base class for errors that are expected at the request boundary.
 * The error handler in app.ts turns them into `{ success: false, kind, error }`.
 */
export class AppError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, readonly statusCode: number) {
    super(message);
    this.kind = kind;
    this.name = kind;
  }
}

export class EmptyCartError extends AppError {
  constructor(message = 'Shopping cart is empty') {
    super('EmptyCartError', message, 400);
  }
}

export class InvalidRecipeError extends AppError {
  constructor(message: string) {
    super('InvalidRecipeError', message, 400);
  }
}

export class SelfSubscriptionError extends AppError {
  constructor(message = 'You cannot subscribe to yourself') {
    super('SelfSubscriptionError', message, 400);
  }
}

export class AlreadyExistsError extends AppError {
  constructor(message: string) {
    super('AlreadyExistsError', message, 409);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NotFoundError', message, 404);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super('ValidationError', message, 400);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Missing or invalid Authorization header') {
    super('UnauthorizedError', message, 401);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Only the author can change this recipe') {
    super('ForbiddenError', message, 403);
  }
}

export class RecipeLockedError extends AppError {
  constructor(recipeId: string) {
    super('RecipeLockedError', `Recipe ${recipeId} has been exported to a shopping list and can no longer be edited`, 409);
  }
}

// Raised while reading the environment, before the server exists
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}
