import type { User, CreateUserInput, Role, RoleClaim } from '../../../types/user.js';
import type {
  IUserStorage,
  IRoleStorage,
  LoginFailureInput,
} from '../../interfaces/user-storage.js';
import { generateId } from '../../../crypto/index.js';
import type { Queryable } from '../client.js';
import { type UserRow, type RoleClaimRow, toUser } from './rows.js';

/**
 * PostgreSQL user storage implementation
 */
export class PostgresUserStorage implements IUserStorage {
  constructor(private readonly db: Queryable) {}

  async create(input: CreateUserInput): Promise<User> {
    const { rows } = await this.db.query<UserRow>(
      `INSERT INTO users (
         id, tenant_id, branch_id, email, user_name, first_name, last_name,
         phone_number, password_hash, failed_login_attempts, is_active, created_at, updated_at
       )
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, 0, true, now(), now())
       RETURNING *`,
      [
        generateId(),
        input.tenantId,
        input.branchId ?? null,
        input.email,
        input.userName,
        input.firstName,
        input.lastName,
        input.phoneNumber ?? null,
        input.passwordHash,
      ]
    );

    const [row] = rows;
    if (!row) {
      throw new Error('INSERT INTO users returned no row');
    }

    for (const roleId of input.roleIds ?? []) {
      await this.db.query(
        'INSERT INTO user_roles (user_id, role_id) VALUES ($1, $2) ON CONFLICT DO NOTHING',
        [row.id, roleId]
      );
    }

    return toUser(row);
  }

  async findById(id: string): Promise<User | null> {
    const { rows } = await this.db.query<UserRow>('SELECT * FROM users WHERE id = $1', [id]);
    const [row] = rows;
    return row ? toUser(row) : null;
  }

  async findByEmail(email: string, tenantId?: string): Promise<User | null> {
    const { rows } = tenantId
      ? await this.db.query<UserRow>(
          'SELECT * FROM users WHERE lower(email) = lower($1) AND tenant_id = $2 LIMIT 1',
          [email, tenantId]
        )
      : await this.db.query<UserRow>(
          'SELECT * FROM users WHERE lower(email) = lower($1) ORDER BY created_at LIMIT 1',
          [email]
        );
    const [row] = rows;
    return row ? toUser(row) : null;
  }

  async findByUserName(userName: string): Promise<User | null> {
    const { rows } = await this.db.query<UserRow>(
      'SELECT * FROM users WHERE lower(user_name) = lower($1) LIMIT 1',
      [userName]
    );
    const [row] = rows;
    return row ? toUser(row) : null;
  }

  async recordLoginFailure(id: string, input: LoginFailureInput): Promise<User | null> {
    // SET expressions all see the pre-update row
    const { rows } = await this.db.query<UserRow>(
      `UPDATE users SET
         failed_login_attempts = CASE
           WHEN lockout_end IS NOT NULL AND lockout_end <= $2 THEN 1
           ELSE failed_login_attempts + 1
         END,
         lockout_end = CASE
           WHEN (CASE
                   WHEN lockout_end IS NOT NULL AND lockout_end <= $2 THEN 1
                   ELSE failed_login_attempts + 1
                 END) >= $3 THEN $4
           WHEN lockout_end IS NOT NULL AND lockout_end <= $2 THEN NULL
           ELSE lockout_end
         END,
         updated_at = $2
       WHERE id = $1
       RETURNING *`,
      [id, input.now, input.maxFailedAttempts, input.lockoutEnd]
    );
    const [row] = rows;
    return row ? toUser(row) : null;
  }

  async recordLoginSuccess(id: string, now: Date): Promise<User | null> {
    const { rows } = await this.db.query<UserRow>(
      `UPDATE users
       SET failed_login_attempts = 0, lockout_end = NULL, last_login_at = $2, updated_at = $2
       WHERE id = $1
       RETURNING *`,
      [id, now]
    );
    const [row] = rows;
    return row ? toUser(row) : null;
  }

  async updatePassword(id: string, passwordHash: string, now: Date): Promise<User | null> {
    const { rows } = await this.db.query<UserRow>(
      'UPDATE users SET password_hash = $2, updated_at = $3 WHERE id = $1 RETURNING *',
      [id, passwordHash, now]
    );
    const [row] = rows;
    return row ? toUser(row) : null;
  }
}

/**
 * Fold role/claim join rows into roles, keeping query order
 */
function groupRoles(rows: RoleClaimRow[]): Role[] {
  const roles = new Map<string, Role>();
  for (const row of rows) {
    let role = roles.get(row.id);
    if (!role) {
      role = { id: row.id, tenantId: row.tenant_id, name: row.name, claims: [] };
      roles.set(row.id, role);
    }
    if (row.claim_type !== null && row.claim_value !== null) {
      role.claims.push({ claimType: row.claim_type, claimValue: row.claim_value });
    }
  }
  return [...roles.values()];
}

/**
 * PostgreSQL role storage implementation
 */
export class PostgresRoleStorage implements IRoleStorage {
  constructor(private readonly db: Queryable) {}

  async create(input: { tenantId: string; name: string; claims?: RoleClaim[] }): Promise<Role> {
    const id = generateId();
    await this.db.query('INSERT INTO roles (id, tenant_id, name) VALUES ($1, $2, $3)', [
      id,
      input.tenantId,
      input.name,
    ]);

    const claims = input.claims ?? [];
    for (const claim of claims) {
      await this.db.query(
        'INSERT INTO role_claims (role_id, claim_type, claim_value) VALUES ($1, $2, $3)',
        [id, claim.claimType, claim.claimValue]
      );
    }

    return { id, tenantId: input.tenantId, name: input.name, claims };
  }

  async findByName(tenantId: string, name: string): Promise<Role | null> {
    const { rows } = await this.db.query<RoleClaimRow>(
      `SELECT r.id, r.tenant_id, r.name, rc.claim_type, rc.claim_value
       FROM roles r
       LEFT JOIN role_claims rc ON rc.role_id = r.id
       WHERE r.tenant_id = $1 AND lower(r.name) = lower($2)
       ORDER BY rc.id`,
      [tenantId, name]
    );
    return groupRoles(rows)[0] ?? null;
  }

  async findByUser(userId: string): Promise<Role[]> {
    const { rows } = await this.db.query<RoleClaimRow>(
      `SELECT r.id, r.tenant_id, r.name, rc.claim_type, rc.claim_value
       FROM user_roles ur
       JOIN roles r ON r.id = ur.role_id
       LEFT JOIN role_claims rc ON rc.role_id = r.id
       WHERE ur.user_id = $1
       ORDER BY r.name, rc.id`,
      [userId]
    );
    return groupRoles(rows);
  }

  async assign(userId: string, roleId: string): Promise<void> {
    await this.db.query(
      'INSERT INTO user_roles (user_id, role_id) VALUES ($1, $2) ON CONFLICT DO NOTHING',
      [userId, roleId]
    );
  }
}
