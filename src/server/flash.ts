// One-shot notices carried across a redirect in a signed cookie

import type { Context } from 'hono';
import { deleteCookie, getSignedCookie, setSignedCookie } from 'hono/cookie';
import { z } from 'zod';
import { FlashMessage } from '../services/rendering/html-renderer.js';

export const FLASH_COOKIE = 'roadmap_flash';

const FlashListSchema = z.array(
  z.object({
    category: z.enum(['error', 'info']),
    message: z.string()
  })
);

const cookieOptions = {
  path: '/',
  httpOnly: true,
  sameSite: 'Lax'
} as const;

export async function setFlash(c: Context, secret: string, messages: FlashMessage[]): Promise<void> {
  await setSignedCookie(c, FLASH_COOKIE, JSON.stringify(messages), secret, cookieOptions);
}

/**
 * Reads and clears pending flash messages.
 * A cookie with a bad signature or unreadable content yields no messages.
 */
export async function takeFlash(c: Context, secret: string): Promise<FlashMessage[]> {
  const raw = await getSignedCookie(c, secret, FLASH_COOKIE);
  if (raw === undefined) {
    return [];
  }
  deleteCookie(c, FLASH_COOKIE, { path: '/' });
  if (raw === false) {
    return [];
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return [];
  }
  const parsed = FlashListSchema.safeParse(data);
  return parsed.success ? parsed.data : [];
}
