import { nanoid } from "nanoid";

/**
 * Mints snapshot-marker tokens and hook operation ids.
 */
export function generateId(): string {
  return nanoid();
}
