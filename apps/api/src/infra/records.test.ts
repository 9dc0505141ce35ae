import { describe, expect, it } from "vitest";
import { listingRecordSchema } from "./records.js";

const listing = {
  accommodationId: "acc-1",
  universities: ["HKU"],
  availableFrom: "2026-01-01",
  availableUntil: "2026-12-31"
};

describe("listingRecordSchema", () => {
  it("acepta fechas de calendario válidas", () => {
    expect(listingRecordSchema.parse(listing)).toEqual(listing);
  });

  it("rechaza fechas con el formato correcto que no existen", () => {
    expect(listingRecordSchema.safeParse({ ...listing, availableUntil: "2026-13-01" }).success).toBe(false);
    expect(listingRecordSchema.safeParse({ ...listing, availableFrom: "2026-02-30" }).success).toBe(false);
  });
});
