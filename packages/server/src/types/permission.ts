/**
 * Permission strings are `resource:action`. Known ones form a closed set so
 * checks against them are type-checked; anything else a tenant defines on a
 * role survives as a custom permission.
 */
export const KNOWN_PERMISSIONS = [
  'inventory:read',
  'inventory:write',
  'inventory:adjust',
  'patients:read',
  'patients:write',
  'prescriptions:read',
  'prescriptions:write',
  'prescriptions:dispense',
  'sales:read',
  'sales:write',
  'sales:refund',
  'payments:read',
  'payments:approve',
  'reports:read',
  'reports:export',
  'users:read',
  'users:write',
  'branches:read',
  'branches:write',
  'branches:cross_access',
  'tenants:manage',
  'subscriptions:manage',
  'system:access',
] as const;

export type KnownPermission = (typeof KNOWN_PERMISSIONS)[number];

export type Permission =
  | { kind: 'known'; name: KnownPermission }
  | { kind: 'custom'; value: string };
