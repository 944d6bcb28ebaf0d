import { Hono, type Context, type Input } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { ACCEPTED_IMAGE_TYPES, DOCUMENT_TYPES, type SubmissionResult } from "shared";
import { onInvalid } from "../utils/validation";
import { sessionMiddleware, type SessionEnv } from "../middleware/session";
import { ClaimSlotNotFoundError, ExtractionError } from "../services/claim-session";
import type { SessionStore } from "../services/session-store";
import type { Extractor } from "../services/extraction";

const groupParams = z.object({
  group: z.coerce.number().int().nonnegative(),
});

const slotParams = groupParams.extend({
  slot: z.coerce.number().int().nonnegative(),
});

const imageForm = (maxFileSize: number) =>
  z.object({
    file: z
      .instanceof(File, { message: "A file is required" })
      .refine((f) => f.size > 0, "The file is empty")
      .refine(
        (f) => f.size <= maxFileSize,
        `Max file size is ${maxFileSize / 1024 / 1024}MB`
      )
      .refine(
        (f) => ACCEPTED_IMAGE_TYPES.includes(f.type),
        "Only jpg, jpeg and png images are accepted"
      ),
  });

function respondWithError<P extends string, I extends Input>(
  c: Context<SessionEnv, P, I>,
  err: unknown,
  action: string
) {
  c.var.log.error(`Error ${action}:`, err);

  if (err instanceof ClaimSlotNotFoundError) {
    return c.json({ error: err.message }, 404);
  }
  if (err instanceof ExtractionError) {
    return c.json({ error: err.message }, 502);
  }
  return c.json(
    { error: err instanceof Error ? err.message : "An unknown error occurred." },
    500
  );
}

export function createSessionRoutes(store: SessionStore, extractor: Extractor, maxFileSize: number) {
  const routes = new Hono<SessionEnv>();

  routes.use(sessionMiddleware(store));

  routes.get("/", (c) => {
    return c.json(c.var.session.toView(), 200);
  });

  routes.post("/groups", (c) => {
    const session = c.var.session;
    session.addGroup();
    c.var.log.info("Added claim group", { groupCount: session.groupCount });
    return c.json(session.toView(), 201);
  });

  routes.patch(
    "/groups/:group",
    zValidator("param", groupParams, onInvalid),
    zValidator("json", z.object({ claimantId: z.string().trim().max(100) }), onInvalid),
    (c) => {
      const { group } = c.req.valid("param");
      const { claimantId } = c.req.valid("json");
      try {
        c.var.session.setClaimantId(group, claimantId);
        return c.json(c.var.session.toView(), 200);
      } catch (err) {
        return respondWithError(c, err, "setting claimant ID");
      }
    }
  );

  routes.put(
    "/groups/:group/slots/:slot",
    zValidator("param", slotParams, onInvalid),
    zValidator("form", imageForm(maxFileSize), onInvalid),
    async (c) => {
      const { group, slot } = c.req.valid("param");
      const { file } = c.req.valid("form");
      try {
        c.var.session.setSlotImage(group, slot, {
          fileName: file.name,
          contentType: file.type,
          size: file.size,
          data: await file.arrayBuffer(),
        });
        c.var.log.info("Stored voucher image", { group, slot, fileName: file.name, size: file.size });
        return c.json(c.var.session.toView(), 200);
      } catch (err) {
        return respondWithError(c, err, "storing voucher image");
      }
    }
  );

  routes.delete(
    "/groups/:group/slots/:slot",
    zValidator("param", slotParams, onInvalid),
    (c) => {
      const { group, slot } = c.req.valid("param");
      try {
        c.var.session.setSlotImage(group, slot, null);
        c.var.log.info("Cleared voucher image", { group, slot });
        return c.json(c.var.session.toView(), 200);
      } catch (err) {
        return respondWithError(c, err, "clearing voucher image");
      }
    }
  );

  routes.patch(
    "/groups/:group/slots/:slot",
    zValidator("param", slotParams, onInvalid),
    zValidator("json", z.object({ documentType: z.enum(DOCUMENT_TYPES) }), onInvalid),
    (c) => {
      const { group, slot } = c.req.valid("param");
      const { documentType } = c.req.valid("json");
      try {
        c.var.session.setDocumentType(group, slot, documentType);
        return c.json(c.var.session.toView(), 200);
      } catch (err) {
        return respondWithError(c, err, "setting document type");
      }
    }
  );

  routes.get(
    "/groups/:group/slots/:slot/image",
    zValidator("param", slotParams, onInvalid),
    (c) => {
      const { group, slot } = c.req.valid("param");
      try {
        const image = c.var.session.getSlotImage(group, slot);
        if (!image) {
          return c.json({ error: "No image uploaded for this voucher" }, 404);
        }
        return c.body(image.data, 200, {
          "Content-Type": image.contentType,
          "Cache-Control": "no-store",
        });
      } catch (err) {
        return respondWithError(c, err, "reading voucher image");
      }
    }
  );

  routes.post("/submit", async (c) => {
    try {
      const tables = await c.var.session.submit(extractor);
      c.var.log.info("Extracted voucher tables", { count: tables.length });
      const result: SubmissionResult = { tables };
      return c.json(result, 200);
    } catch (err) {
      return respondWithError(c, err, "submitting claim groups");
    }
  });

  return routes;
}
