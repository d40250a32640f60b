export type { RecordStore } from './record_store';
export { MemoryRecordStore } from './memory/memory_record_store';
export { FsRecordStore } from './fs/fs_record_store';
export type { FsRecordStoreOptions, Serializer } from './fs/fs_record_store';
