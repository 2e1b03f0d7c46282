import { z } from 'zod';

const EmailSchema = z
  .string()
  .trim()
  .toLowerCase()
  .email('Invalid email address')
  .max(254, 'Email must be at most 254 characters');

// Strength rules are enforced by the password hasher; the schema only bounds the input
const PasswordInputSchema = z
  .string()
  .min(1, 'Password is required')
  .max(256, 'Password must be at most 256 characters');

const TokenInputSchema = z.string().trim().min(1, 'Token is required');

// Registration schema with email, password and display name
export const RegisterSchema = z.object({
  email: EmailSchema,
  password: PasswordInputSchema,
  name: z.string().trim().min(1, 'Name is required').max(100, 'Name must be at most 100 characters'),
});

export type RegisterInput = z.infer<typeof RegisterSchema>;

// Login schema with email and password
export const LoginSchema = z.object({
  email: EmailSchema,
  password: PasswordInputSchema,
});

export type LoginInput = z.infer<typeof LoginSchema>;

export const RefreshSchema = z.object({
  refreshToken: TokenInputSchema,
});

export type RefreshInput = z.infer<typeof RefreshSchema>;

export const LogoutSchema = z.object({
  refreshToken: TokenInputSchema,
  accessToken: TokenInputSchema.optional(),
});

export type LogoutInput = z.infer<typeof LogoutSchema>;

export const ChangePasswordSchema = z.object({
  currentPassword: PasswordInputSchema,
  newPassword: PasswordInputSchema,
});

export type ChangePasswordInput = z.infer<typeof ChangePasswordSchema>;

export const VerifyEmailQuerySchema = z.object({
  token: TokenInputSchema,
});

export type VerifyEmailQuery = z.infer<typeof VerifyEmailQuerySchema>;

export const EmailOnlySchema = z.object({
  email: EmailSchema,
});

export type EmailOnlyInput = z.infer<typeof EmailOnlySchema>;

export const PasswordResetSchema = z.object({
  token: TokenInputSchema,
  newPassword: PasswordInputSchema,
});

export type PasswordResetInput = z.infer<typeof PasswordResetSchema>;

// Client device details recorded with a session
export const DeviceInfoSchema = z.object({
  userAgent: z.string().max(512).optional(),
  ipAddress: z.string().ip().optional(),
});

export type DeviceInfo = z.infer<typeof DeviceInfoSchema>;

export const TokenPairResponseSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  accessTokenExpiresAt: z.string().datetime(),
  refreshTokenExpiresAt: z.string().datetime(),
  tokenType: z.literal('Bearer'),
});

export type TokenPairResponse = z.infer<typeof TokenPairResponseSchema>;

export const ErrorResponseSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
  }),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
