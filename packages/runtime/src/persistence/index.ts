export { JsonFileMemoryRepository, mergeChanges, snapshotFileName } from "./json-file-repository.js"
export { PostgresMemoryRepository, recordToRow, rowToRecord } from "./postgres-repository.js"
