import { match } from "ts-pattern";
import { sameUniversity } from "./role-resolver.js";
import type { Principal } from "./types.js";

type Owned = { memberUid: string; university: string };

export type ReadScope = { university: string; memberUid?: string };

export const canAccessReservation = (principal: Principal, owned: Owned) =>
  match(principal)
    .with(
      { kind: "member" },
      ({ uid, university }) => owned.memberUid === uid && sameUniversity(owned.university, university)
    )
    .with({ kind: "specialist" }, ({ university }) => sameUniversity(owned.university, university))
    .exhaustive();

// Members only ever see their own records; specialists see their whole university.
export const readScopeOf = (principal: Principal): ReadScope =>
  match<Principal, ReadScope>(principal)
    .with({ kind: "member" }, ({ uid, university }) => ({ university, memberUid: uid }))
    .with({ kind: "specialist" }, ({ university }) => ({ university }))
    .exhaustive();
