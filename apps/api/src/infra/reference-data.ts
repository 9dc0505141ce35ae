import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import type { ReferenceData } from "../application/ports.js";
import { canonicalUniversity } from "../domain/index.js";
import { universityRecordSchema } from "./records.js";

const universitiesFileSchema = z.object({ universities: z.array(universityRecordSchema).min(1) });

export const loadReferenceData = (universitiesFile: string): Promise<ReferenceData> =>
  readFile(resolve(process.cwd(), universitiesFile), "utf8")
    .then((text) => universitiesFileSchema.parse(JSON.parse(text)))
    .then(({ universities }) => ({
      universities: universities.map(({ code, name }) => ({ code: canonicalUniversity(code), name }))
    }));
