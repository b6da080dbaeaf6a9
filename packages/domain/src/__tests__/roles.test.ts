import { describe, it, expect } from 'vitest';
import { DEFAULT_ROLE, ROLE_NAMES, isAdminPrivileged, resolveRole } from '../roles.js';

const plain = { isSuperuser: false, isStaff: false };

describe('resolveRole', () => {
  it('gives admin to superusers and staff regardless of groups', () => {
    expect(resolveRole({ isSuperuser: true, isStaff: false }, ['company'])).toBe('admin');
    expect(resolveRole({ isSuperuser: false, isStaff: true }, [])).toBe('admin');
  });

  it('follows membership precedence admin, employee, company', () => {
    expect(resolveRole(plain, ['company', 'admin'])).toBe('admin');
    expect(resolveRole(plain, ['company', 'employee'])).toBe('employee');
    expect(resolveRole(plain, ['company'])).toBe('company');
  });

  it('ignores unknown groups and falls back to employee', () => {
    expect(resolveRole(plain, ['auditors', 'Admin'])).toBe('employee');
    expect(resolveRole(plain, [])).toBe(DEFAULT_ROLE);
  });

  it('admin group membership does not make the actor privileged', () => {
    expect(resolveRole(plain, ['admin'])).toBe('admin');
    expect(isAdminPrivileged(plain)).toBe(false);
  });

  it('exposes the canonical group names', () => {
    expect(ROLE_NAMES).toEqual(['admin', 'employee', 'company']);
  });
});
