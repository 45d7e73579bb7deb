import type { Expense } from "../types/expense";
import type { User } from "../types/user";
import type { ProfileView } from "../services/user.service";
import { pointsFor } from "../services/points.service";
import { fromCents } from "../utils/money";

export function toUserResponse(user: User, roles?: string[]) {
  return {
    id: user.id,
    email: user.email,
    first_name: user.first_name,
    last_name: user.last_name,
    is_verified: user.is_verified,
    last_login_at: user.last_login_at,
    created_at: user.created_at,
    ...(roles ? { roles } : {}),
  };
}

export function toExpenseResponse(expense: Expense) {
  return {
    id: expense.id,
    amount: fromCents(expense.amount_cents),
    category: expense.category,
    note: expense.note,
    spent_at: expense.spent_at,
    created_at: expense.created_at,
    points: pointsFor(expense),
  };
}

export function toProfileResponse(view: ProfileView) {
  return {
    user: toUserResponse(view.user),
    bio: view.profile?.bio ?? null,
    gender: view.profile?.gender ?? null,
    age: view.profile?.age ?? null,
    profile_picture: view.profile?.profile_picture ?? null,
    points: view.points,
    total_transactions: view.totalTransactions,
    total_spent: view.totalSpent,
    is_profile_complete: view.isProfileComplete,
    updated_at: view.profile?.updated_at ?? null,
  };
}
