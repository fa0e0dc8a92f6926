import { BadRequestException } from "@nestjs/common";
import type { z } from "zod";

/** Validates a request body, answering 400 with the zod issues instead of a 500. */
export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new BadRequestException({
      message: "Invalid request body",
      issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message }))
    });
  }
  return parsed.data;
}
