import { z } from 'zod';

export const API_BASE_PATH = '/api/v1' as const;

/** Notice type the control panel renders as a plain informational message */
export const NOTICE_TYPE_DEFAULT = 'D' as const;

export const AppReadResponseSchema = z
  .object({
    server: z.union([z.string().min(1), z.number()]).transform(String),
  })
  .passthrough();

export const AccountInfoResponseSchema = z
  .object({
    email: z.string().min(1),
  })
  .passthrough();

export interface ServerInfo {
  serverId: string;
}

export interface AccountInfo {
  email: string;
}

export type InstalledPayload = Array<{ id: string }>;

export type NoticePayload = Array<{ type: typeof NOTICE_TYPE_DEFAULT; content: string }>;

/**
 * Outcome of a best-effort write call. Callers may drop it; it is returned
 * so the drop stays visible at the call site.
 */
export interface NotificationResult {
  ok: boolean;
  status?: number;
  error?: string;
}

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;
