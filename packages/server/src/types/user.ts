/**
 * User record. Only the authentication facet of the wider user entity is
 * modelled here; tenant, branch and roles are referenced by id.
 */
export interface User {
  id: string;
  tenantId: string;
  branchId?: string;
  email: string;
  userName: string;
  firstName: string;
  lastName: string;
  phoneNumber?: string;

  // Credential facet
  passwordHash: string; // iterations.salt.key
  failedLoginAttempts: number;
  lockoutEnd?: Date;
  lastLoginAt?: Date;
  isActive: boolean;

  createdAt: Date;
  updatedAt: Date;
}

/**
 * User creation input
 */
export interface CreateUserInput {
  tenantId: string;
  branchId?: string;
  email: string;
  userName: string;
  firstName: string;
  lastName: string;
  phoneNumber?: string;
  passwordHash: string;
  roleIds?: string[];
}

/**
 * Free-form claim attached to a role, e.g. { claimType: 'inventory', claimValue: 'read' }
 */
export interface RoleClaim {
  claimType: string;
  claimValue: string;
}

/**
 * Role with its permission claims, loaded by explicit query rather than
 * through an object graph
 */
export interface Role {
  id: string;
  tenantId: string;
  name: string;
  claims: RoleClaim[];
}
