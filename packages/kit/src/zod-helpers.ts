import type { z } from "zod";

/** Flattens zod issues into `path: message` lines. Root-level issues use `(root)`. */
export function formatZodErrors(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.length > 0 ? i.path.join(".") : "(root)"}: ${i.message}`);
}
