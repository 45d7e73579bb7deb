import * as yup from "yup";

import { GENDERS } from "../types/profile";

export const updateProfileSchema = yup.object({
  first_name: yup.string().trim().max(100).nullable().optional(),
  last_name: yup.string().trim().max(100).nullable().optional(),
  bio: yup.string().trim().max(500, "Bio must be 500 characters or less").nullable().optional(),
  gender: yup.string().oneOf(GENDERS).nullable().optional(),
  age: yup.number().integer().min(13).max(120).nullable().optional(),
  profile_picture: yup.string().url("profile_picture must be a URL").nullable().optional(),
});

export const listUsersSchema = yup.object({
  search: yup.string().trim().optional(),
  page: yup.number().integer().min(1).optional(),
  limit: yup.number().integer().min(1).max(100).optional(),
});
