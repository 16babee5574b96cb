export { createSql, closeDb, type Sql, type SqlOptions } from './client.js';
export * from './stores/types.js';
export { PgMoodLogStore } from './stores/moodLogs.js';
export { PgChatArchiveStore } from './stores/chatArchive.js';
export { PgCrisisResourceCache } from './stores/crisisCache.js';
