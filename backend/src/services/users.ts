import { AlreadyExistsError, NotFoundError, ValidationError } from '../errors.js';
import type { AuthUser, Page, PageRequest, ProfileInput, UserProfileDoc } from '../types/index.js';
import type { UserStore } from './stores.js';

// "me" is the path of the caller's own profile
const RESERVED_USERNAMES = new Set(['me']);
const USERNAME_PATTERN = /^[\w.@+-]+$/;
const MAX_NAME_LENGTH = 150;

export function validateUsername(username: string): string {
  const trimmed = username.trim();
  if (RESERVED_USERNAMES.has(trimmed.toLowerCase())) {
    throw new ValidationError(`Username "${trimmed}" is reserved`);
  }
  if (!USERNAME_PATTERN.test(trimmed)) {
    const invalid = [...new Set(trimmed.replace(/[\w.@+-]/g, ''))].join('');
    throw new ValidationError(`Username contains invalid characters: ${invalid || 'whitespace'}`);
  }
  if (trimmed.length > MAX_NAME_LENGTH) {
    throw new ValidationError(`Username is longer than ${MAX_NAME_LENGTH} characters`);
  }
  return trimmed;
}

export class UserService {
  constructor(private readonly users: UserStore) {}

  async getUser(id: string): Promise<UserProfileDoc> {
    const user = await this.users.getUser(id);
    if (!user) {
      throw new NotFoundError(`User ${id} not found`);
    }
    return user;
  }

  async getUsers(ids: string[]): Promise<UserProfileDoc[]> {
    return this.users.getUsers(ids);
  }

  async listUsers(page: PageRequest): Promise<Page<UserProfileDoc>> {
    return this.users.listUsers(page);
  }

  /** Create or update the profile of the signed-in user. */
  async saveProfile(authUser: AuthUser, input: ProfileInput): Promise<UserProfileDoc> {
    const username = validateUsername(input.username);
    const current = await this.users.getUser(authUser.uid);
    const email = input.email?.trim() || authUser.email || current?.email;
    if (!email) {
      throw new ValidationError('An email address is required');
    }

    const holder = await this.users.findByUsername(username);
    if (holder && holder.id !== authUser.uid) {
      throw new AlreadyExistsError(`Username "${username}" is already taken`);
    }

    const now = new Date();
    return this.users.saveUser({
      id: authUser.uid,
      email,
      username,
      firstName: input.firstName.trim(),
      lastName: input.lastName.trim(),
      avatarUrl: input.avatarUrl ?? current?.avatarUrl,
      createdAt: current?.createdAt ?? now,
      updatedAt: now,
    });
  }
}
