// Table
export {
  LinearHashTable,
  type LinearHashTableOptions,
  type TableStats,
} from "./table/linear_hash_table";

// Addressing
export {
  hash_key,
  bucket_address,
  bit_string,
  type BucketIndex,
} from "./table/address";

// Errors
export {
  AppError,
  HASH_TABLE_ERROR,
  HashTableError,
  is_hash_table_error,
} from "./utils/error";

// Configuration
export { type LogLevel, type Environment } from "./utils/environment";
