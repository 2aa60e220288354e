/**
 * Common Schema Definitions
 *
 * Shared column definitions and types used across database tables.
 */

import { customType, timestamp } from 'drizzle-orm/pg-core';
import { UlidCastError, UlidType } from '../ulid-type.js';
import { ulidToUuid, uuidToUlid } from '../uuid.js';

/**
 * ULID column - 26-character ULID string in the application,
 * 16 bytes in a PostgreSQL `uuid` column.
 *
 * Writing an invalid ULID throws UlidCastError.
 */
export const ulidColumn = customType<{ data: string; driverData: string }>({
	dataType() {
		return UlidType.type;
	},
	toDriver(value: string): string {
		const uuid = ulidToUuid(value);
		if (uuid.isErr()) {
			throw new UlidCastError(uuid.error.message, uuid.error.type, value);
		}
		return uuid.value;
	},
	fromDriver(value: string): string {
		const text = uuidToUlid(value);
		if (text.isErr()) {
			throw new UlidCastError(text.error.message, text.error.type, value);
		}
		return text.value;
	},
});

/**
 * ULID column that generates its own value on insert.
 */
export const generatedUlidColumn = (name: string) => ulidColumn(name).$defaultFn(UlidType.autogenerate);

/**
 * Standard timestamp column with timezone.
 */
export const timestampColumn = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });

/**
 * Base entity fields that all entities should have.
 * - id: ULID primary key, generated on insert
 * - createdAt: When the entity was created
 * - updatedAt: When the entity was last modified
 */
export const baseEntityColumns = {
	id: generatedUlidColumn('id').primaryKey(),
	createdAt: timestampColumn('created_at').notNull().defaultNow(),
	updatedAt: timestampColumn('updated_at').notNull().defaultNow(),
};

/**
 * Base entity type with common fields.
 */
export interface BaseEntity {
	readonly id: string;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

/**
 * Input type for creating a new entity.
 * id, createdAt and updatedAt are auto-populated.
 */
export type NewEntity<T extends BaseEntity> = Omit<T, 'id' | 'createdAt' | 'updatedAt'> & {
	id?: string;
	createdAt?: Date;
	updatedAt?: Date;
};
