export * from './access-grants.table';
export * from './groups.table';
export * from './memberships.table';
export * from './secrets.table';
