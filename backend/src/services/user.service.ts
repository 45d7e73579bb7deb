import { forbidden, notFound } from "../errors/app-error";
import type { ProfileRepository } from "../repositories/profile.repository";
import type { UserRepository } from "../repositories/user.repository";
import type { Expense } from "../types/expense";
import type { ProfileChanges, UserProfile } from "../types/profile";
import type { User } from "../types/user";
import { fromCents } from "../utils/money";
import type { Session } from "./auth.service";
import type { PointsService } from "./points.service";

export interface ProfileView {
  user: User;
  profile: UserProfile | null;
  points: number;
  totalTransactions: number;
  totalSpent: number;
  isProfileComplete: boolean;
}

export interface ProfileUpdate extends ProfileChanges {
  first_name?: string | null;
  last_name?: string | null;
}

export interface UserListResult {
  items: User[];
  total: number;
  page: number;
  pages: number;
}

export interface UserService {
  getProfile(userId: string): Promise<ProfileView>;
  updateProfile(userId: string, update: ProfileUpdate): Promise<ProfileView>;
  listUsers(query: { search?: string; page?: number; limit?: number }): Promise<UserListResult>;
  getUser(requester: Session, userId: string): Promise<User>;
  deleteUser(userId: string): Promise<void>;
}

export interface UserServiceDeps {
  users: UserRepository;
  profiles: ProfileRepository;
  points: PointsService;
  replay: (userId: string) => AsyncIterable<Expense>;
  now?: () => Date;
}

export function isProfileComplete(user: User, profile: UserProfile | null): boolean {
  return Boolean(
    user.first_name &&
      user.last_name &&
      profile?.bio &&
      profile.gender &&
      profile.age !== null,
  );
}

export function createUserService({
  users,
  profiles,
  points,
  replay,
  now = () => new Date(),
}: UserServiceDeps): UserService {
  async function activeUser(userId: string): Promise<User> {
    const user = await users.findById(userId);

    if (!user || user.deleted_at) {
      throw notFound("User");
    }

    return user;
  }

  async function view(user: User): Promise<ProfileView> {
    const profile = await profiles.findByUserId(user.id);

    let totalTransactions = 0;
    let totalCents = 0;
    for await (const entry of replay(user.id)) {
      totalTransactions += 1;
      totalCents += entry.amount_cents;
    }

    return {
      user,
      profile,
      points: await points.balance(user.id),
      totalTransactions,
      totalSpent: fromCents(totalCents),
      isProfileComplete: isProfileComplete(user, profile),
    };
  }

  return {
    async getProfile(userId) {
      return view(await activeUser(userId));
    },

    async updateProfile(userId, { first_name, last_name, ...changes }) {
      let user = await activeUser(userId);

      if (first_name !== undefined || last_name !== undefined) {
        user = (await users.updateNames(userId, { first_name, last_name })) ?? user;
      }

      const hasProfileChanges = Object.values(changes).some((v) => v !== undefined);
      if (hasProfileChanges) {
        await profiles.upsert(userId, changes);
      }

      return view(user);
    },

    async listUsers({ search, page = 1, limit = 10 }) {
      const safeLimit = Math.min(100, Math.max(1, Math.floor(limit)));
      const safePage = Math.max(1, Math.floor(page));
      const term = search?.trim();

      const { rows, total } = await users.list({
        search: term ? term : undefined,
        limit: safeLimit,
        offset: (safePage - 1) * safeLimit,
      });

      return {
        items: rows,
        total,
        page: safePage,
        pages: Math.ceil(total / safeLimit),
      };
    },

    async getUser(requester, userId) {
      if (requester.user.id !== userId && !requester.roles.includes("admin")) {
        throw forbidden();
      }

      return activeUser(userId);
    },

    async deleteUser(userId) {
      const deleted = await users.softDelete(userId, now());

      if (!deleted) {
        throw notFound("User");
      }

      console.log(`Soft-deleted user: ${userId}`);
    },
  };
}
