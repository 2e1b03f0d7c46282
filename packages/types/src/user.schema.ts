import { z } from 'zod';

export const UserRoleSchema = z.enum(['user', 'admin']);

export type UserRole = z.infer<typeof UserRoleSchema>;

// User schema for API responses (without sensitive fields)
export const UserResponseSchema = z.object({
  id: z.string().uuid(),
  email: z.string().email(),
  name: z.string(),
  role: UserRoleSchema,
  isVerified: z.boolean(),
  createdAt: z.string().datetime(),
});

export type UserResponse = z.infer<typeof UserResponseSchema>;
