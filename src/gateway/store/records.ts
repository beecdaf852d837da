import { z } from 'zod';

/** Parses a stored JSON value; anything unreadable counts as absent. */
export function parseStoredJson<S extends z.ZodTypeAny>(raw: string | null, schema: S): z.infer<S> | null {
  if (raw === null) return null;

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = schema.safeParse(data);
  return parsed.success ? parsed.data : null;
}
