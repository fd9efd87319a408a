/**
 * Storage Module
 *
 * EntityStore backends: SQLite for the server, memory for tests and
 * development.
 */

export * from './memoryStore';
export * from './databaseStore';
