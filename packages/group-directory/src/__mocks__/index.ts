export { asExecutor, createMockDrizzleDatabase, MockDrizzleDatabase } from './drizzle.mock';
