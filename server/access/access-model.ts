/**
 * ACCESS MODEL
 *
 * Answers "which categories may this user see" from persisted state on every
 * call. Admins see the full catalog; analysts see exactly their grants.
 * Unknown, deleted or deactivated users see nothing and report version -1.
 * Storage failures surface as DataSourceError.
 */

import type { User } from '@shared/schema';
import type { IStorage } from '../storage';
import { DataSourceError, getErrorMessage } from '../errors/app-errors';

export type AccessDecision = 'allowed' | 'denied';

export const NO_ACCESS_VERSION = -1;

export interface AccessScope {
  userId: number;
  role: User['role'] | null;
  accessVersion: number;
  categories: Set<string>;
}

export class AccessModel {
  constructor(private readonly storage: IStorage) {}

  async authorize(userId: number, category: string): Promise<AccessDecision> {
    const visible = await this.resolveVisibleCategories(userId);
    return visible.has(category) ? 'allowed' : 'denied';
  }

  async resolveVisibleCategories(userId: number): Promise<Set<string>> {
    return (await this.resolveScope(userId)).categories;
  }

  async currentAccessVersion(userId: number): Promise<number> {
    const user = await this.loadActiveUser(userId);
    return user ? user.accessVersion : NO_ACCESS_VERSION;
  }

  /**
   * Version and visible set read together, for callers that key caches on
   * the version of the scope they are about to query.
   */
  async resolveScope(userId: number): Promise<AccessScope> {
    const user = await this.loadActiveUser(userId);
    if (!user) {
      return { userId, role: null, accessVersion: NO_ACCESS_VERSION, categories: new Set() };
    }

    const names = await this.read(userId, () => user.role === 'admin'
      ? this.storage.listCategoryNames()
      : this.storage.getGrantedCategoryNames(user.id));

    return { userId, role: user.role, accessVersion: user.accessVersion, categories: new Set(names) };
  }

  private async loadActiveUser(userId: number): Promise<User | undefined> {
    const user = await this.read(userId, () => this.storage.getUser(userId));
    return user && user.isActive ? user : undefined;
  }

  private async read<T>(userId: number, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      throw new DataSourceError(`Access scope lookup failed: ${getErrorMessage(error)}`, { userId });
    }
  }
}
