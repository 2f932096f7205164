/**
 * Identity Cache
 * Keeps the last known identity in memory and in durable storage so startup
 * can show who is signed in before the backend has answered.
 */

import { z } from 'zod';
import { USER_ROLES, USER_STATUSES, type UserIdentity } from '../../lib/api/types';
import type { KeyValueStorage } from '../../lib/storage';

const identitySchema = z.object({
  id: z.string().min(1),
  email: z.string().min(1),
  username: z.string(),
  firstName: z.string(),
  lastName: z.string(),
  role: z.enum(USER_ROLES),
  status: z.enum(USER_STATUSES),
  isActive: z.boolean(),
  isVerified: z.boolean(),
});

export class IdentityCache {
  private value: UserIdentity | null = null;
  private readonly key: string;

  constructor(private readonly storage: KeyValueStorage, prefix = 'wastetrack') {
    this.key = `${prefix}:auth:user`;
  }

  get(): UserIdentity | null {
    return this.value;
  }

  set(identity: UserIdentity): void {
    this.storage.setItem(this.key, JSON.stringify(identity));
    this.value = { ...identity };
  }

  /** Reload from durable storage; an unreadable entry is dropped */
  load(): UserIdentity | null {
    const raw = this.storage.getItem(this.key);
    if (!raw) {
      this.value = null;
      return null;
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      parsed = null;
    }
    const result = identitySchema.safeParse(parsed);
    if (!result.success) {
      console.warn('AUTH IdentityCache: discarding unreadable cached identity');
      this.clear();
      return null;
    }
    this.value = result.data;
    return result.data;
  }

  clear(): void {
    this.storage.removeItem(this.key);
    this.value = null;
  }

  /** Drop the in-memory copy only */
  forget(): void {
    this.value = null;
  }
}
