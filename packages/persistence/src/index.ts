/**
 * @ulidkit/persistence
 *
 * Storage adapter for ULIDs: the application works with 26-character strings,
 * the database stores 16 bytes in a PostgreSQL `uuid` column.
 *
 * Key components:
 * - UlidType adapter (cast, dump, load, autogenerate)
 * - UUID conversions for the driver representation
 * - DrizzleORM column definitions
 *
 * @example
 * ```typescript
 * import { pgTable, text } from 'drizzle-orm/pg-core';
 * import { UlidType, baseEntityColumns, ulidColumn } from '@ulidkit/persistence';
 *
 * export const orders = pgTable('orders', {
 *     ...baseEntityColumns,
 *     customerId: ulidColumn('customer_id').notNull(),
 *     note: text('note'),
 * });
 *
 * // Validate user input before lookup
 * const customerId = UlidType.cast(req.params.customerId);
 * if (customerId.isErr()) {
 *     return reply.code(400).send(customerId.error);
 * }
 * ```
 */

// Type adapter
export {
	UlidType,
	UlidCastError,
	type CastError,
	type UlidCastErrorReason,
} from './ulid-type.js';

// UUID representation
export { toUuid, fromUuid, ulidToUuid, uuidToUlid, type UuidError } from './uuid.js';

// Schema definitions
export {
	ulidColumn,
	generatedUlidColumn,
	timestampColumn,
	baseEntityColumns,
	type BaseEntity,
	type NewEntity,
} from './schema/index.js';
