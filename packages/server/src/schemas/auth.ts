/**
 * Zod schemas for the account and session endpoints.
 */
import { z } from 'zod';

export const loginSchema = z.object({
  username: z.string().trim().min(1).max(255),
  password: z.string().min(1).max(1024),
  remember_me: z.boolean().default(false),
});

export const refreshTokenBodySchema = z.object({
  refresh_token: z.string().min(1).max(512),
});

export const registerSchema = z.object({
  username: z.string().trim().min(3).max(64),
  password: z.string().min(1).max(1024),
  email: z.string().trim().email().max(255),
  firstname: z.string().trim().min(1).max(255),
  lastname: z.string().trim().min(1).max(255),
});

export const confirmEmailQuerySchema = z.object({
  id: z.coerce.number().int().positive(),
  code: z.string().min(1).max(128),
});

export const changePasswordSchema = z.object({
  current_password: z.string().min(1).max(1024),
  new_password: z.string().min(1).max(1024),
});

export const accountStatusSchema = z.object({
  status: z.enum(['active', 'pending', 'inactive']),
});

export type LoginInput = z.infer<typeof loginSchema>;
export type RegisterInput = z.infer<typeof registerSchema>;
export type ChangePasswordInput = z.infer<typeof changePasswordSchema>;
