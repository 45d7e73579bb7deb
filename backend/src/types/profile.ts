export const GENDERS = ["male", "female", "other", "prefer_not_to_say"] as const;

export type Gender = (typeof GENDERS)[number];

export interface UserProfile {
  user_id: string;
  bio: string | null;
  gender: Gender | null;
  age: number | null;
  profile_picture: string | null;
  updated_at: Date;
}

export type ProfileChanges = Partial<
  Pick<UserProfile, "bio" | "gender" | "age" | "profile_picture">
>;
