export { decideAccommodation, emptyAccommodation, foldAccommodation } from "./accommodation-decider.js";
export { canAccessReservation, readScopeOf, type ReadScope } from "./access.js";
export { checkAvailability, checkWindow, hasEnded, isActive, isTerminal, overlaps } from "./availability.js";
export { canonicalUniversity, resolveRole, sameUniversity, type RoleResolution } from "./role-resolver.js";
