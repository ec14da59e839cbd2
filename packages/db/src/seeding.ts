import bcrypt from 'bcryptjs';
import type { KioskStore, NewHost } from './store.js';

export const SEED_ADMIN_USERNAME = 'admin';

export const SEED_HOSTS: NewHost[] = [
  { full_name: 'Front Desk', email: 'reception@example.com', phone: null, department: 'Facilities' },
  { full_name: 'Dana Whitfield', email: 'dana.whitfield@example.com', phone: '5550100', department: 'Engineering' },
];

/** Idempotent: existing admins and hosts are left untouched. */
export async function seed(store: KioskStore, adminPassword: string): Promise<{ admins: number; hosts: number }> {
  let admins = 0;
  const created = await store.ensureAdminUser({
    username: SEED_ADMIN_USERNAME,
    hashedPassword: bcrypt.hashSync(adminPassword, 10),
    full_name: 'Kiosk Administrator',
  });
  if (created) admins++;

  let hosts = 0;
  for (const host of SEED_HOSTS) {
    if (await store.ensureHost(host)) hosts++;
  }

  return { admins, hosts };
}
