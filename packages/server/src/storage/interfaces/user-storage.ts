import type { User, CreateUserInput, Role, RoleClaim } from '../../types/user.js';

/**
 * Parameters for recording a failed password check
 */
export interface LoginFailureInput {
  now: Date;
  maxFailedAttempts: number;
  lockoutEnd: Date;
}

/**
 * Storage interface for the credential facet of users
 */
export interface IUserStorage {
  /**
   * Create a new user (and assign the given role ids)
   */
  create(input: CreateUserInput): Promise<User>;

  /**
   * Find a user by ID
   */
  findById(id: string): Promise<User | null>;

  /**
   * Find a user by e-mail, case-insensitively.
   * Without a tenant the first match across tenants is returned.
   */
  findByEmail(email: string, tenantId?: string): Promise<User | null>;

  /**
   * Find a user by user name, case-insensitively, across tenants
   */
  findByUserName(userName: string): Promise<User | null>;

  /**
   * Atomically record a failed login. A lockout that has already elapsed
   * restarts the counter; reaching the limit sets `lockoutEnd`.
   */
  recordLoginFailure(id: string, input: LoginFailureInput): Promise<User | null>;

  /**
   * Reset the failure counter and lockout, and stamp the last login time
   */
  recordLoginSuccess(id: string, now: Date): Promise<User | null>;

  /**
   * Replace the password hash
   */
  updatePassword(id: string, passwordHash: string, now: Date): Promise<User | null>;
}

/**
 * Storage interface for roles and their permission claims
 */
export interface IRoleStorage {
  /**
   * Create a role in a tenant
   */
  create(input: { tenantId: string; name: string; claims?: RoleClaim[] }): Promise<Role>;

  /**
   * Find a role by name within a tenant (case-insensitive)
   */
  findByName(tenantId: string, name: string): Promise<Role | null>;

  /**
   * Roles assigned to a user, with their claims
   */
  findByUser(userId: string): Promise<Role[]>;

  /**
   * Assign a role to a user (no-op if already assigned)
   */
  assign(userId: string, roleId: string): Promise<void>;
}
