export { ConnectionGuard, openDatabase, type SqlParam, type SqlStatement, type Row } from './connection.js';
export { CollectionManager } from './collections.js';
