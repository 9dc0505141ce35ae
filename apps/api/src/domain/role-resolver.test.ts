import { describe, expect, it } from "vitest";
import { resolveRole, sameUniversity } from "./role-resolver.js";

const codeOf = (token: string | undefined, universities?: ReadonlySet<string>) => {
  const resolution = resolveRole(token, { universities });
  return resolution.kind === "failed" ? resolution.error.error.code : "resolved";
};

describe("resolveRole", () => {
  it("resuelve un miembro con su uid", () => {
    expect(resolveRole("HKU:member:m-1")).toEqual({
      kind: "resolved",
      principal: { kind: "member", university: "HKU", uid: "m-1" }
    });
  });

  it("resuelve un especialista sin id con dos partes", () => {
    expect(resolveRole("HKU:specialist")).toEqual({
      kind: "resolved",
      principal: { kind: "specialist", university: "HKU", specialistId: null }
    });
  });

  it("trata un id vacío de especialista como ausente", () => {
    expect(resolveRole("HKU:specialist:")).toEqual({
      kind: "resolved",
      principal: { kind: "specialist", university: "HKU", specialistId: null }
    });
  });

  it("normaliza el código de universidad a mayúsculas", () => {
    expect(resolveRole(" hku:specialist:s-1 ")).toEqual({
      kind: "resolved",
      principal: { kind: "specialist", university: "HKU", specialistId: "s-1" }
    });
  });

  it("exige uid para miembros", () => {
    expect(codeOf("HKU:member")).toBe("MEMBER_ID_REQUIRED");
    expect(codeOf("HKU:member:")).toBe("MEMBER_ID_REQUIRED");
  });

  it("rechaza tokens ausentes o mal formados", () => {
    expect(codeOf(undefined)).toBe("ROLE_TOKEN_MISSING");
    expect(codeOf("   ")).toBe("ROLE_TOKEN_MISSING");
    expect(codeOf("HKU")).toBe("ROLE_FORMAT_INVALID");
    expect(codeOf("HKU:member:m-1:extra")).toBe("ROLE_FORMAT_INVALID");
    expect(codeOf(":specialist:s-1")).toBe("ROLE_FORMAT_INVALID");
  });

  it("rechaza tipos de rol desconocidos", () => {
    expect(codeOf("HKU:admin:a-1")).toBe("ROLE_TYPE_INVALID");
    expect(codeOf("HKU:Member:m-1")).toBe("ROLE_TYPE_INVALID");
  });

  it("rechaza universidades fuera del catálogo cuando se conoce", () => {
    const universities = new Set(["HKU", "CUHK"]);
    expect(codeOf("cuhk:member:m-9", universities)).toBe("resolved");
    expect(codeOf("XYZ:member:m-9", universities)).toBe("UNKNOWN_UNIVERSITY");
  });

  it("los fallos son errores de formato de rol", () => {
    const resolution = resolveRole("HKU:guest");
    expect(resolution.kind === "failed" ? resolution.error.error.kind : null).toBe("RoleFormatError");
  });
});

describe("sameUniversity", () => {
  it("compara códigos sin distinguir mayúsculas", () => {
    expect(sameUniversity("hku", "HKU")).toBe(true);
    expect(sameUniversity("HKU", "CUHK")).toBe(false);
  });
});
