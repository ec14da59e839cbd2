import 'dotenv/config';
import { createPool, getDatabaseUrl } from './connection.js';
import { PgKioskStore } from './pg-store.js';
import { seed } from './seeding.js';

// Dev password for the seed admin unless SEED_ADMIN_PASSWORD is set
const DEV_PASSWORD = 'kiosk-admin';

async function main() {
  const store = new PgKioskStore(createPool(getDatabaseUrl()));
  try {
    const result = await seed(store, process.env.SEED_ADMIN_PASSWORD || DEV_PASSWORD);
    console.log(`Seeded ${result.admins} admin user(s) and ${result.hosts} host(s)`);
  } finally {
    await store.close();
  }
}

main().catch((err) => {
  console.error('Seed failed:', err);
  process.exit(1);
});
