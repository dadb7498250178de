export type AssignableRole = 1 | 2;
export type RoleCode = 0 | AssignableRole | 99;

export const ROLE = {
  ADMIN: 0,
  VENDOR: 1,
  INSPECTOR: 2,
  NONE: 99,
} as const satisfies Record<string, RoleCode>;

export type RoleLabel = "ADMIN" | "VENDOR" | "INSPECTOR" | "NONE";

export const ROLE_LABELS: Record<RoleCode, RoleLabel> = {
  0: "ADMIN",
  1: "VENDOR",
  2: "INSPECTOR",
  99: "NONE",
};

export function isAssignableRole(value: unknown): value is AssignableRole {
  return value === ROLE.VENDOR || value === ROLE.INSPECTOR;
}
