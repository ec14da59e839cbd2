export { getDatabaseUrl, createPool, type PostgresEnv } from './connection.js';
export {
  hostNameFromEmail,
  type KioskStore,
  type NewVisitor,
  type NewHost,
  type NewVisitLog,
  type NewAdminUser,
} from './store.js';
export { PgKioskStore, parseVisitStatus } from './pg-store.js';
export { MemoryKioskStore, type MemoryKioskStoreOptions } from './memory-store.js';
export { seed, SEED_HOSTS, SEED_ADMIN_USERNAME } from './seeding.js';
