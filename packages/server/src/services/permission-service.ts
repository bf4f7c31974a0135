import {
  KNOWN_PERMISSIONS,
  type KnownPermission,
  type Permission,
} from '../types/permission.js';
import type { Role } from '../types/user.js';

const KNOWN = new Set<string>(KNOWN_PERMISSIONS);

function isKnownPermission(value: string): value is KnownPermission {
  return KNOWN.has(value);
}

/**
 * Service for permission parsing and role flattening
 */
export class PermissionService {
  /**
   * Parse a `resource:action` string. Anything outside the known set is
   * kept as a custom permission rather than rejected.
   */
  parsePermission(value: string): Permission {
    if (isKnownPermission(value)) {
      return { kind: 'known', name: value };
    }
    return { kind: 'custom', value };
  }

  formatPermission(permission: Permission): string {
    switch (permission.kind) {
      case 'known':
        return permission.name;
      case 'custom':
        return permission.value;
    }
  }

  /**
   * Flatten role claims into `claimType:claimValue` strings, deduplicated
   * in first-seen order
   */
  flattenRolePermissions(roles: readonly Role[]): string[] {
    const seen = new Set<string>();
    for (const role of roles) {
      for (const claim of role.claims) {
        seen.add(this.formatPermission(this.parsePermission(`${claim.claimType}:${claim.claimValue}`)));
      }
    }
    return [...seen];
  }

  /**
   * Whether a granted permission list satisfies every required permission
   */
  hasAll(granted: readonly string[], required: readonly Permission[]): boolean {
    const grantedSet = new Set(granted);
    return required.every((permission) => grantedSet.has(this.formatPermission(permission)));
  }
}

// Export singleton instance
export const permissionService = new PermissionService();
