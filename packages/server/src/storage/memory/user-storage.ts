import type { User, CreateUserInput, Role, RoleClaim } from '../../types/user.js';
import type { IUserStorage, IRoleStorage, LoginFailureInput } from '../interfaces/user-storage.js';
import { generateId } from '../../crypto/index.js';
import { LockedRepository, type Mutex } from './snapshot.js';

/**
 * In-memory user storage implementation
 */
export class MemoryUserStorage extends LockedRepository implements IUserStorage {
  private users = new Map<string, User>();

  constructor(lock: Mutex, private readonly roles: MemoryRoleStorage) {
    super(lock);
  }

  async create(input: CreateUserInput): Promise<User> {
    return this.lock.run(async () => {
      const now = new Date();
      const user: User = {
        id: generateId(),
        tenantId: input.tenantId,
        branchId: input.branchId,
        email: input.email,
        userName: input.userName,
        firstName: input.firstName,
        lastName: input.lastName,
        phoneNumber: input.phoneNumber,
        passwordHash: input.passwordHash,
        failedLoginAttempts: 0,
        isActive: true,
        createdAt: now,
        updatedAt: now,
      };

      this.users.set(user.id, user);
      for (const roleId of input.roleIds ?? []) {
        await this.roles.assign(user.id, roleId);
      }
      return user;
    });
  }

  async findById(id: string): Promise<User | null> {
    return this.lock.run(async () => this.users.get(id) ?? null);
  }

  async findByEmail(email: string, tenantId?: string): Promise<User | null> {
    return this.lock.run(async () => {
      const normalized = email.toLowerCase();
      for (const user of this.users.values()) {
        if (user.email.toLowerCase() === normalized && (!tenantId || user.tenantId === tenantId)) {
          return user;
        }
      }
      return null;
    });
  }

  async findByUserName(userName: string): Promise<User | null> {
    return this.lock.run(async () => {
      const normalized = userName.toLowerCase();
      for (const user of this.users.values()) {
        if (user.userName.toLowerCase() === normalized) {
          return user;
        }
      }
      return null;
    });
  }

  async recordLoginFailure(id: string, input: LoginFailureInput): Promise<User | null> {
    return this.lock.run(async () => {
      const user = this.users.get(id);
      if (!user) return null;

      const lockoutElapsed = user.lockoutEnd !== undefined && user.lockoutEnd <= input.now;
      const failedLoginAttempts = (lockoutElapsed ? 0 : user.failedLoginAttempts) + 1;

      let lockoutEnd = lockoutElapsed ? undefined : user.lockoutEnd;
      if (failedLoginAttempts >= input.maxFailedAttempts) {
        lockoutEnd = input.lockoutEnd;
      }

      return this.put({ ...user, failedLoginAttempts, lockoutEnd, updatedAt: input.now });
    });
  }

  async recordLoginSuccess(id: string, now: Date): Promise<User | null> {
    return this.lock.run(async () => {
      const user = this.users.get(id);
      if (!user) return null;

      return this.put({
        ...user,
        failedLoginAttempts: 0,
        lockoutEnd: undefined,
        lastLoginAt: now,
        updatedAt: now,
      });
    });
  }

  async updatePassword(id: string, passwordHash: string, now: Date): Promise<User | null> {
    return this.lock.run(async () => {
      const user = this.users.get(id);
      if (!user) return null;

      return this.put({ ...user, passwordHash, updatedAt: now });
    });
  }

  /**
   * Test helper for toggling account state
   */
  async setActive(id: string, isActive: boolean): Promise<void> {
    await this.lock.run(async () => {
      const user = this.users.get(id);
      if (user) {
        this.put({ ...user, isActive });
      }
    });
  }

  snapshot(): () => void {
    const saved = new Map(this.users);
    return () => {
      this.users = saved;
    };
  }

  private put(user: User): User {
    this.users.set(user.id, user);
    return user;
  }
}

/**
 * In-memory role storage implementation
 */
export class MemoryRoleStorage extends LockedRepository implements IRoleStorage {
  private roles = new Map<string, Role>();
  private userRoles = new Map<string, Set<string>>(); // userId -> Set<roleId>

  async create(input: { tenantId: string; name: string; claims?: RoleClaim[] }): Promise<Role> {
    return this.lock.run(async () => {
      const role: Role = {
        id: generateId(),
        tenantId: input.tenantId,
        name: input.name,
        claims: input.claims ?? [],
      };

      this.roles.set(role.id, role);
      return role;
    });
  }

  async findByName(tenantId: string, name: string): Promise<Role | null> {
    return this.lock.run(async () => {
      const normalized = name.toLowerCase();
      for (const role of this.roles.values()) {
        if (role.tenantId === tenantId && role.name.toLowerCase() === normalized) {
          return role;
        }
      }
      return null;
    });
  }

  async findByUser(userId: string): Promise<Role[]> {
    return this.lock.run(async () => {
      const roleIds = this.userRoles.get(userId);
      if (!roleIds) return [];

      const roles: Role[] = [];
      for (const roleId of roleIds) {
        const role = this.roles.get(roleId);
        if (role) roles.push(role);
      }
      return roles;
    });
  }

  async assign(userId: string, roleId: string): Promise<void> {
    await this.lock.run(async () => {
      const assigned = this.userRoles.get(userId) ?? new Set<string>();
      assigned.add(roleId);
      this.userRoles.set(userId, assigned);
    });
  }

  snapshot(): () => void {
    const savedRoles = new Map(this.roles);
    const savedUserRoles = new Map(
      [...this.userRoles].map(([userId, roleIds]) => [userId, new Set(roleIds)] as const)
    );
    return () => {
      this.roles = savedRoles;
      this.userRoles = savedUserRoles;
    };
  }
}
