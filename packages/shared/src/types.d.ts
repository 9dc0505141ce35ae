export type RoleKind = "member" | "specialist";

export type ActorKind = RoleKind | "system";

export type ReservationStatus = "pending" | "confirmed" | "cancelled" | "completed";

export type ErrorKind =
  | "RoleFormatError"
  | "AuthorizationError"
  | "NotFoundError"
  | "DateRangeError"
  | "OverlapConflictError"
  | "IllegalTransitionError"
  | "DuplicateRatingError"
  | "ScoreRangeError"
  | "ValidationError"
  | "ContentionError"
  | "InternalError";

export type ErrorShape = {
  error: {
    kind: ErrorKind;
    code: string;
    reason: string;
    meta: Record<string, unknown>;
  };
};

export type CursorPage<T> = {
  items: T[];
  nextCursor: string | null;
};

export type ReservationView = {
  reservationId: string;
  accommodationId: string;
  memberUid: string;
  university: string;
  startDate: string;
  endDate: string;
  status: ReservationStatus;
  cancelledBy: RoleKind | null;
  createdAtUtc: string;
  updatedAtUtc: string;
};

export type RatingView = {
  ratingId: string;
  reservationId: string;
  accommodationId: string;
  memberUid: string;
  university: string;
  score: number;
  comment: string | null;
  ratedAtUtc: string;
};

export type UniversityView = {
  code: string;
  name: string;
};

export type RatingSummary = {
  accommodationId: string;
  average: number | null;
  count: number;
};
