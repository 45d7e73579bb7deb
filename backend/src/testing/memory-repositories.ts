import { buildPage, type ExpenseRepository } from "../repositories/expense.repository";
import type { ProfileRepository } from "../repositories/profile.repository";
import type { UserRepository } from "../repositories/user.repository";
import type { Expense } from "../types/expense";
import type { UserProfile } from "../types/profile";
import type { RefreshToken } from "../types/refresh-token";
import type { User } from "../types/user";

export interface MemoryStore {
  users: Map<string, User>;
  roles: Map<string, Set<string>>;
  refreshTokens: RefreshToken[];
  profiles: Map<string, UserProfile>;
  expenses: Map<string, Expense>;
}

export function createMemoryStore(): MemoryStore {
  return {
    users: new Map(),
    roles: new Map(),
    refreshTokens: [],
    profiles: new Map(),
    expenses: new Map(),
  };
}

/** An error shaped like the server errors node-postgres rejects with. */
export function pgError(code: string, message: string, constraint?: string) {
  return Object.assign(new Error(message), { code, constraint });
}

// Insertion order stands in for created_at ties within one millisecond.
let sequence = 0;
const insertedAt = new Map<string, number>();

function compareExpenses(a: Expense, b: Expense): number {
  return (
    a.spent_at.getTime() - b.spent_at.getTime() ||
    a.created_at.getTime() - b.created_at.getTime() ||
    (insertedAt.get(a.id) ?? 0) - (insertedAt.get(b.id) ?? 0) ||
    a.id.localeCompare(b.id)
  );
}

export function createMemoryUserRepository(store: MemoryStore): UserRepository {
  function patch(userId: string, changes: Partial<User>): User | null {
    const user = store.users.get(userId);
    if (!user) return null;

    const next = { ...user, ...changes };
    store.users.set(userId, next);
    return next;
  }

  return {
    async findByEmail(email) {
      return [...store.users.values()].find((u) => u.email === email) ?? null;
    },

    async findById(userId) {
      return store.users.get(userId) ?? null;
    },

    async findByVerificationTokenHash(tokenHash) {
      return (
        [...store.users.values()].find(
          (u) => u.verification_token_hash === tokenHash,
        ) ?? null
      );
    },

    async create(user, roles) {
      if ([...store.users.values()].some((u) => u.email === user.email)) {
        throw pgError(
          "23505",
          'duplicate key value violates unique constraint "users_email_key"',
          "users_email_key",
        );
      }

      const created: User = {
        ...user,
        is_verified: false,
        last_login_at: null,
        deleted_at: null,
        created_at: new Date(),
      };
      store.users.set(created.id, created);
      store.roles.set(created.id, new Set<string>(roles));
      return created;
    },

    async setVerificationToken(userId, tokenHash, expiresAt) {
      patch(userId, {
        verification_token_hash: tokenHash,
        verification_expires_at: expiresAt,
      });
    },

    async markVerified(userId) {
      patch(userId, {
        is_verified: true,
        verification_token_hash: null,
        verification_expires_at: null,
      });
    },

    async touchLastLogin(userId, at) {
      patch(userId, { last_login_at: at });
    },

    async updateNames(userId, names) {
      const changes: Partial<User> = {};
      if (names.first_name !== undefined) changes.first_name = names.first_name;
      if (names.last_name !== undefined) changes.last_name = names.last_name;
      return patch(userId, changes);
    },

    async softDelete(userId, at) {
      const user = store.users.get(userId);
      if (!user || user.deleted_at) return false;

      patch(userId, { deleted_at: at });
      return true;
    },

    async list({ search, limit, offset }) {
      const needle = search?.toLowerCase();
      const matches = [...store.users.values()]
        .filter((u) => !u.deleted_at)
        .filter(
          (u) =>
            !needle ||
            [u.email, u.first_name, u.last_name].some((v) =>
              v?.toLowerCase().includes(needle),
            ),
        )
        .sort(
          (a, b) =>
            b.created_at.getTime() - a.created_at.getTime() ||
            a.id.localeCompare(b.id),
        );

      return { rows: matches.slice(offset, offset + limit), total: matches.length };
    },

    async getUserRoles(userId) {
      return [...(store.roles.get(userId) ?? [])].sort();
    },

    async saveRefreshToken(userId, tokenHash, expiresAt) {
      store.refreshTokens.push({
        id: store.refreshTokens.length + 1,
        user_id: userId,
        token_hash: tokenHash,
        expires_at: expiresAt,
        revoked: false,
        created_at: new Date(),
      });
    },

    async findRefreshToken(tokenHash, now) {
      return (
        store.refreshTokens.find(
          (t) =>
            t.token_hash === tokenHash &&
            !t.revoked &&
            t.expires_at.getTime() > now.getTime(),
        ) ?? null
      );
    },

    async revokeRefreshToken(tokenHash) {
      for (const token of store.refreshTokens) {
        if (token.token_hash === tokenHash) token.revoked = true;
      }
    },
  };
}

export function createMemoryProfileRepository(store: MemoryStore): ProfileRepository {
  return {
    async findByUserId(userId) {
      return store.profiles.get(userId) ?? null;
    },

    async upsert(userId, changes) {
      const current: UserProfile = store.profiles.get(userId) ?? {
        user_id: userId,
        bio: null,
        gender: null,
        age: null,
        profile_picture: null,
        updated_at: new Date(),
      };

      const next: UserProfile = { ...current, updated_at: new Date() };
      if (changes.bio !== undefined) next.bio = changes.bio;
      if (changes.gender !== undefined) next.gender = changes.gender;
      if (changes.age !== undefined) next.age = changes.age;
      if (changes.profile_picture !== undefined) {
        next.profile_picture = changes.profile_picture;
      }

      store.profiles.set(userId, next);
      return next;
    },
  };
}

export function createMemoryExpenseRepository(store: MemoryStore): ExpenseRepository {
  return {
    async create(expense) {
      const created: Expense = { ...expense, created_at: new Date() };
      insertedAt.set(created.id, ++sequence);
      store.expenses.set(created.id, created);
      return created;
    },

    async findById(id) {
      return store.expenses.get(id) ?? null;
    },

    async update(id, userId, changes) {
      const current = store.expenses.get(id);
      if (!current || current.user_id !== userId) return null;

      const next: Expense = { ...current };
      if (changes.amount_cents !== undefined) next.amount_cents = changes.amount_cents;
      if (changes.category !== undefined) next.category = changes.category;
      if (changes.note !== undefined) next.note = changes.note;
      if (changes.spent_at !== undefined) next.spent_at = changes.spent_at;

      store.expenses.set(id, next);
      return next;
    },

    async delete(id, userId) {
      const current = store.expenses.get(id);
      if (!current || current.user_id !== userId) return false;

      return store.expenses.delete(id);
    },

    async list(userId, filter) {
      const page = filter.page ?? 1;
      const limit = filter.limit ?? 0;
      const { category, from, to } = filter;

      const matches = [...store.expenses.values()]
        .filter((e) => e.user_id === userId)
        .filter((e) => !category || e.category === category)
        .filter((e) => !from || e.spent_at.getTime() >= from.getTime())
        .filter((e) => !to || e.spent_at.getTime() <= to.getTime())
        .sort(compareExpenses);

      if (filter.sort !== "asc") matches.reverse();

      const data = limit > 0 ? matches.slice((page - 1) * limit, page * limit) : matches;
      return buildPage(data, matches.length, page, limit);
    },
  };
}

export function createMemoryRepositories() {
  const store = createMemoryStore();

  return {
    store,
    users: createMemoryUserRepository(store),
    profiles: createMemoryProfileRepository(store),
    expenses: createMemoryExpenseRepository(store),
  };
}
