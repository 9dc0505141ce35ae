import { z } from "zod";
import { calendarDay as day } from "../http/schemas.js";

const status = z.enum(["pending", "confirmed", "cancelled", "completed"]);
const role = z.enum(["member", "specialist"]);

export const reservationRecordSchema = z.object({
  reservationId: z.string(),
  accommodationId: z.string(),
  memberUid: z.string(),
  university: z.string(),
  startDate: day,
  endDate: day,
  status,
  cancelledBy: role.nullable(),
  createdAtUtc: z.string(),
  updatedAtUtc: z.string()
});

export const ratingRecordSchema = z.object({
  ratingId: z.string(),
  reservationId: z.string(),
  accommodationId: z.string(),
  memberUid: z.string(),
  university: z.string(),
  score: z.number().int(),
  comment: z.string().nullable(),
  ratedAtUtc: z.string()
});

export const listingRecordSchema = z.object({
  accommodationId: z.string(),
  universities: z.array(z.string()),
  availableFrom: day,
  availableUntil: day,
  type: z.string().optional(),
  address: z.string().optional(),
  dailyPrice: z.number().optional(),
  beds: z.number().int().optional(),
  bedrooms: z.number().int().optional()
});

export const memberRecordSchema = z.object({
  uid: z.string(),
  name: z.string(),
  university: z.string()
});

export const specialistRecordSchema = z.object({
  specialistId: z.string(),
  name: z.string(),
  email: z.string().optional(),
  university: z.string()
});

export const universityRecordSchema = z.object({
  code: z.string(),
  name: z.string()
});

const metadata = {
  eventId: z.string(),
  streamId: z.string(),
  streamType: z.literal("accommodation"),
  version: z.number().int().positive(),
  occurredAtUtc: z.string(),
  meta: z.record(z.unknown())
};

export const recordedAccommodationEventSchema = z.discriminatedUnion("type", [
  z.object({
    ...metadata,
    type: z.literal("ReservationCreated"),
    payload: z.object({ reservation: reservationRecordSchema })
  }),
  z.object({
    ...metadata,
    type: z.literal("ReservationStatusChanged"),
    payload: z.object({
      reservationId: z.string(),
      fromStatus: status,
      toStatus: status,
      actor: z.enum(["member", "specialist", "system"]),
      changedAtUtc: z.string()
    })
  }),
  z.object({
    ...metadata,
    type: z.literal("RatingSubmitted"),
    payload: z.object({
      rating: ratingRecordSchema,
      completedReservation: z.boolean()
    })
  }),
  z.object({
    ...metadata,
    type: z.literal("RatingRemoved"),
    payload: z.object({
      ratingId: z.string(),
      reservationId: z.string(),
      removedAtUtc: z.string()
    })
  })
]);

export const seedSchema = z.object({
  accommodations: z.array(listingRecordSchema).default([]),
  members: z.array(memberRecordSchema).default([]),
  specialists: z.array(specialistRecordSchema).default([])
});

export type Seed = z.infer<typeof seedSchema>;
