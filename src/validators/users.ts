// src/validators/users.ts
import { z } from "zod";
import { EMAIL_PATTERN } from "../utils/email";

export const Email = z.string().trim().regex(EMAIL_PATTERN, "invalid email address");

export const Password = z.string().min(6).max(128);

export const UserSignup = z.object({
  name: z.string().trim().min(1).max(100),
  role: z.enum(["admin", "client"]),
  email: Email,
  password: Password,
});

export const Credentials = z.object({
  email: Email,
  password: z.string().min(1),
});

export const PasswordChange = z.object({
  password: Password,
});

export type UserSignupInput = z.infer<typeof UserSignup>;
