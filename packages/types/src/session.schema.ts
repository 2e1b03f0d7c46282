import { z } from 'zod';

export const SessionResponseSchema = z.object({
  id: z.string(),
  createdAt: z.string().datetime(),
  expiresAt: z.string().datetime(),
  ipAddress: z.string().nullable(),
  userAgent: z.string().nullable(),
  isCurrent: z.boolean(),
});

export const ListSessionsResponseSchema = z.object({
  sessions: z.array(SessionResponseSchema),
});

export type SessionResponse = z.infer<typeof SessionResponseSchema>;
export type ListSessionsResponse = z.infer<typeof ListSessionsResponseSchema>;
