import { match, P } from "ts-pattern";
import { domainError } from "./error.js";
import type { DomainError, Principal } from "./types.js";

export type RoleResolution =
  | { kind: "resolved"; principal: Principal }
  | { kind: "failed"; error: DomainError };

const resolved = (principal: Principal): RoleResolution => ({ kind: "resolved", principal });

const failed = (code: string, reason: string, meta: Record<string, unknown> = {}): RoleResolution => ({
  kind: "failed",
  error: domainError("RoleFormatError", code, reason, meta)
});

const isNonEmpty = (value: string | undefined): value is string =>
  value !== undefined && value.trim().length > 0;

export const canonicalUniversity = (code: string) => code.trim().toUpperCase();

export const sameUniversity = (left: string, right: string) =>
  canonicalUniversity(left) === canonicalUniversity(right);

const principalOf = (university: string, roleType: string, roleId: string | undefined) =>
  match<[string, string | undefined], RoleResolution>([roleType, roleId])
    .with(["member", P.when(isNonEmpty)], ([, uid]) =>
      resolved({ kind: "member", university, uid: uid.trim() })
    )
    .with(["member", P._], () => failed("MEMBER_ID_REQUIRED", "Member role requires a member uid", {}))
    .with(["specialist", P._], ([, specialistId]) =>
      resolved({
        kind: "specialist",
        university,
        specialistId: isNonEmpty(specialistId) ? specialistId.trim() : null
      })
    )
    .otherwise(([type]) =>
      failed("ROLE_TYPE_INVALID", "Role type must be member or specialist", { roleType: type })
    );

/**
 * Parses `<university_code>:<role_type>[:<role_id>]` into a principal.
 *
 * When `universities` is given, the (case-insensitive) university code must be one of them.
 */
export const resolveRole = (
  token: string | undefined,
  { universities }: { universities?: ReadonlySet<string> } = {}
): RoleResolution => {
  if (!isNonEmpty(token)) {
    return failed("ROLE_TOKEN_MISSING", "Role token is required");
  }
  const parts = token.trim().split(":");
  if (parts.length < 2 || parts.length > 3) {
    return failed("ROLE_FORMAT_INVALID", "Role token must look like <university>:<role>[:<id>]", {
      parts: parts.length
    });
  }
  const [rawUniversity = "", roleType = "", roleId] = parts;
  const resolution = principalOf(canonicalUniversity(rawUniversity), roleType, roleId);
  if (resolution.kind === "failed") {
    return resolution;
  }
  const { university } = resolution.principal;
  if (university.length === 0) {
    return failed("ROLE_FORMAT_INVALID", "University code is empty");
  }
  return universities !== undefined && !universities.has(university)
    ? failed("UNKNOWN_UNIVERSITY", "University code is not recognised", { university })
    : resolution;
};
