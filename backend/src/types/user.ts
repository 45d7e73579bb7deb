export interface User {
  id: string;
  email: string;
  password_hash: string;
  first_name: string | null;
  last_name: string | null;
  is_verified: boolean;
  verification_token_hash: string | null;
  verification_expires_at: Date | null;
  last_login_at: Date | null;
  deleted_at: Date | null;
  created_at: Date;
}

export interface NewUser {
  id: string;
  email: string;
  password_hash: string;
  first_name: string | null;
  last_name: string | null;
  verification_token_hash: string;
  verification_expires_at: Date;
}

export type RoleName = "user" | "admin";

export interface UserNames {
  first_name?: string | null;
  last_name?: string | null;
}
