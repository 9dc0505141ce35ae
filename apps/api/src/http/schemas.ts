import { z } from "zod";

export const calendarDay = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD")
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00.000Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
  }, "Not a calendar date");

const identifier = z.string().trim().min(1);

const limit = z
  .string()
  .regex(/^\d+$/, "Expected a positive integer")
  .transform(Number)
  .pipe(z.number().int().min(1).max(100))
  .optional();

export const createReservationBodySchema = z.object({
  accommodationId: identifier,
  startDate: calendarDay,
  endDate: calendarDay,
  memberUid: identifier.optional()
});

export const transitionBodySchema = z.object({
  status: z.enum(["cancelled", "confirmed", "completed"])
});

// The score is only checked for being a number here; whole-number and range rules belong to
// the rating rules so they report their own error codes.
export const submitRatingBodySchema = z.object({
  reservationId: identifier,
  score: z.number().finite(),
  comment: z.string().max(2000).optional()
});

export const reservationListQuerySchema = z.object({
  memberUid: identifier.optional(),
  accommodationId: identifier.optional(),
  status: z.enum(["pending", "confirmed", "cancelled", "completed"]).optional(),
  limit,
  nextCursor: z.string().min(1).optional()
});

export const ratingListQuerySchema = z.object({
  memberUid: identifier.optional(),
  accommodationId: identifier.optional(),
  limit,
  nextCursor: z.string().min(1).optional()
});
