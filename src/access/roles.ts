export enum Role {
  ADMIN = 'Admin',
  BACKEND_SIGNER = 'BackendSigner',
  EVENT_MANAGER = 'EventManager',
}

export const ALL_ROLES: readonly Role[] = [Role.ADMIN, Role.BACKEND_SIGNER, Role.EVENT_MANAGER];

export function parseRole(value: string): Role | undefined {
  return ALL_ROLES.find((role) => role === value);
}
