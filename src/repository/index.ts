export { initializeDatabase, closeDatabase } from './database.js';
export { ObservationRepository, type IObservationRepository, type StoredAuditEntry, type ObservationAggregates } from './observation-repository.js';
