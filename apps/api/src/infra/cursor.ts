import { z } from "zod";
import { InvalidCursorError } from "../application/ports.js";

const cursorKeySchema = z.record(z.unknown());

export const encodeCursor = (key: Record<string, unknown> | undefined) =>
  key ? Buffer.from(JSON.stringify(key)).toString("base64url") : null;

export const decodeCursor = (cursor: string | undefined): Record<string, unknown> | undefined => {
  if (!cursor) {
    return undefined;
  }
  try {
    return cursorKeySchema.parse(JSON.parse(Buffer.from(cursor, "base64url").toString("utf8")));
  } catch (error) {
    throw new InvalidCursorError("nextCursor is not a cursor issued by this service", { cause: error });
  }
};
