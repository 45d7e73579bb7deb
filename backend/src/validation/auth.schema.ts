import * as yup from "yup";

const email = yup
  .string()
  .trim()
  .lowercase()
  .required("Email is required")
  .email("Invalid email");

export const registerSchema = yup.object({
  email,
  password: yup
    .string()
    .required("Password is required")
    // bcrypt ignores everything past 72 bytes
    .max(72, "Password must be 72 characters or less"),
  first_name: yup.string().trim().max(100).nullable().optional(),
  last_name: yup.string().trim().max(100).nullable().optional(),
});

export const loginSchema = yup.object({
  email,
  password: yup.string().required("Password is required"),
});

export const verifySchema = yup.object({
  token: yup.string().trim().required("Token is required"),
});

export const resendVerificationSchema = yup.object({
  email,
});
