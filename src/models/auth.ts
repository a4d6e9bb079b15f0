import { z } from 'zod';

export const AuthRequestSchema = z.object({
  access_key: z.string(),
});

export interface AuthResponse {
  authenticated: boolean;
  message: string;
  token?: string;
}
