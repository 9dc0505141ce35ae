import { z } from "zod";
import type { IndexedEntity, StreamIndex } from "../application/ports.js";
import type { ObjectBucket } from "./object-bucket.js";

const entryKey = (entity: IndexedEntity, entityId: string) => `index/${entity}/${entityId}.json`;

const entrySchema = z.object({ accommodationId: z.string() });

/**
 * Id to stream pointers kept beside the event streams. Entries are written before the event
 * that introduces the id is appended and are never rewritten; a pointer whose event never
 * committed leads to a stream without that id, which reads as not found.
 */
export const makeBucketStreamIndex = ({ bucket }: { bucket: ObjectBucket }): StreamIndex => ({
  recordStream: (entity, entityId, accommodationId) =>
    bucket.putIfAbsent(entryKey(entity, entityId), JSON.stringify({ accommodationId })).then(() => undefined),
  locateStream: (entity, entityId) =>
    bucket
      .findText(entryKey(entity, entityId))
      .then((text) => (text === null ? null : entrySchema.parse(JSON.parse(text)).accommodationId))
});
