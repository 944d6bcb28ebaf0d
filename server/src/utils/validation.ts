import type { Context, Env } from "hono";
import type { ZodError } from "zod";

// Hook for zValidator: reply with the zod messages instead of the raw issue list.
export function onInvalid<E extends Env, P extends string>(
  result: { success: true } | { success: false; error: ZodError },
  c: Context<E, P>
) {
  if (!result.success) {
    return c.json(
      { error: result.error.issues.map((issue) => issue.message).join("; ") },
      400
    );
  }
}
