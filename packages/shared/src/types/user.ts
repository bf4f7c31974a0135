/**
 * User projection returned on login and by GET /auth/me
 */
export interface AuthUser {
  id: string;
  email: string;
  firstName: string;
  lastName: string;
  tenantId: string;
  branchId?: string;
  roles: string[];
  permissions: string[];
}
